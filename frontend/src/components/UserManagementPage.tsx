// frontend/src/components/UserManagementPage.tsx
import { useCallback, useEffect, useRef, useState } from 'react';
import type { FC, FormEvent } from 'react';
import type { User, UserFormData } from '../types';
import * as api from '../services/api';
import { logger } from '../utils/logger';
import UserForm from './UserForm';
import UserTable from './UserTable';

export const MESSAGE_TIMEOUT_MS = 5000;

const emptyForm: UserFormData = {
  name: '',
  email: '',
  phone: '',
};

const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

const UserManagementPage: FC = () => {
  const [users, setUsers] = useState<User[]>([]);
  const [formData, setFormData] = useState<UserFormData>(emptyForm);
  const [editingId, setEditingId] = useState<number | null>(null);
  const [searchTerm, setSearchTerm] = useState<string>('');
  const [isLoading, setIsLoading] = useState<boolean>(false);
  const [isSubmitting, setIsSubmitting] = useState<boolean>(false);
  const [error, setError] = useState<string>('');
  const [success, setSuccess] = useState<string>('');

  // Every list load takes a ticket; only the newest ticket may write the table.
  const loadSeq = useRef(0);
  // Term of the last load, reused when refreshing after a mutation.
  const appliedTerm = useRef('');

  const loadUsers = useCallback(async (term: string) => {
    const seq = ++loadSeq.current;
    const trimmed = term.trim();
    appliedTerm.current = trimmed;
    setIsLoading(true);

    try {
      const list = trimmed ? await api.searchUsers(trimmed) : await api.fetchUsers();
      if (seq !== loadSeq.current) {
        logger.debug('Dropping stale user list', { seq, latest: loadSeq.current });
        return;
      }
      setUsers(list);
    } catch (err: unknown) {
      if (seq !== loadSeq.current) return;
      const prefix = trimmed ? 'Failed to search users: ' : 'Failed to fetch users: ';
      setError(prefix + errorMessage(err));
      logger.error('Error loading users:', err);
    } finally {
      if (seq === loadSeq.current) setIsLoading(false);
    }
  }, []);

  useEffect(() => {
    void loadUsers('');
  }, [loadUsers]);

  useEffect(() => {
    if (!success && !error) return undefined;

    const timer = setTimeout(() => {
      setSuccess('');
      setError('');
    }, MESSAGE_TIMEOUT_MS);

    return () => clearTimeout(timer);
  }, [success, error]);

  const resetForm = () => {
    setFormData(emptyForm);
    setEditingId(null);
  };

  const handleFieldChange = (field: keyof UserFormData, value: string) => {
    setFormData((prev) => ({ ...prev, [field]: value }));
  };

  const handleSubmit = async () => {
    setSuccess('');

    if (!formData.name.trim() || !formData.email.trim()) {
      setError('Name and email are required');
      return;
    }
    if (!formData.email.includes('@')) {
      setError('Please enter a valid email address');
      return;
    }

    const action = editingId === null ? 'create' : 'update';
    setIsSubmitting(true);
    setError('');

    try {
      if (editingId === null) {
        await api.createUser(formData);
        setSuccess('User created successfully!');
      } else {
        await api.updateUser(editingId, formData);
        setSuccess('User updated successfully!');
      }
      resetForm();
      await loadUsers(appliedTerm.current);
    } catch (err: unknown) {
      setError(`Failed to ${action} user: ${errorMessage(err)}`);
      logger.error(`Error trying to ${action} user:`, err);
    } finally {
      setIsSubmitting(false);
    }
  };

  const handleEdit = (user: User) => {
    setFormData({
      name: user.name,
      email: user.email,
      phone: user.phone ?? '',
    });
    setEditingId(user.id);
    setError('');
    setSuccess('');
  };

  const handleDelete = async (user: User) => {
    if (!window.confirm('Are you sure you want to delete this user?')) return;

    setIsSubmitting(true);
    setError('');
    setSuccess('');

    try {
      await api.deleteUser(user.id);
      if (editingId === user.id) resetForm();
      setSuccess('User deleted successfully!');
      await loadUsers(appliedTerm.current);
    } catch (err: unknown) {
      setError(`Failed to delete user: ${errorMessage(err)}`);
      logger.error('Error deleting user:', err);
    } finally {
      setIsSubmitting(false);
    }
  };

  const handleSearch = (e: FormEvent) => {
    e.preventDefault();
    void loadUsers(searchTerm);
  };

  const handleClearSearch = () => {
    setSearchTerm('');
    void loadUsers('');
  };

  return (
    <div className="user-management">
      <header>
        <h1>User Management System</h1>
        <p>Manage users with full CRUD operations</p>
      </header>

      {error && (
        <p className="error-message" role="alert">
          {error}
        </p>
      )}
      {success && (
        <p className="success-message" role="status">
          {success}
        </p>
      )}

      <form className="search-bar" role="search" onSubmit={handleSearch}>
        <input
          type="text"
          placeholder="Search by name..."
          aria-label="Search users"
          value={searchTerm}
          onChange={(e) => setSearchTerm(e.target.value)}
        />
        <button type="submit">Search</button>
        <button type="button" onClick={handleClearSearch}>
          Clear
        </button>
      </form>

      <UserForm
        formData={formData}
        isEditing={editingId !== null}
        isSubmitting={isSubmitting}
        onChange={handleFieldChange}
        onSubmit={() => {
          void handleSubmit();
        }}
        onCancel={resetForm}
      />

      <section className="user-list">
        <div className="list-header">
          <h2>Users ({users.length})</h2>
          <button type="button" onClick={() => void loadUsers(appliedTerm.current)} disabled={isLoading}>
            {isLoading ? 'Loading...' : 'Refresh'}
          </button>
        </div>

        {isLoading ? (
          <p>Loading users...</p>
        ) : (
          <UserTable
            users={users}
            onEdit={handleEdit}
            onDelete={(user) => {
              void handleDelete(user);
            }}
          />
        )}
      </section>
    </div>
  );
};

export default UserManagementPage;
