// frontend/src/components/UserTable.tsx
import type { FC } from 'react';
import type { User } from '../types';

interface UserTableProps {
  users: User[];
  onEdit: (user: User) => void;
  onDelete: (user: User) => void;
}

const formatCreatedAt = (iso: string): string => {
  const date = new Date(iso);
  return Number.isNaN(date.getTime()) ? '-' : date.toLocaleDateString();
};

const UserTable: FC<UserTableProps> = ({ users, onEdit, onDelete }) => {
  if (users.length === 0) {
    return <p className="empty-state">No users found</p>;
  }

  return (
    <table className="user-table">
      <thead>
        <tr>
          <th>ID</th>
          <th>Name</th>
          <th>Email</th>
          <th>Phone</th>
          <th>Created At</th>
          <th>Actions</th>
        </tr>
      </thead>
      <tbody>
        {users.map((user) => (
          <tr key={user.id}>
            <td>{user.id}</td>
            <td>{user.name}</td>
            <td>{user.email}</td>
            <td>{user.phone ?? '-'}</td>
            <td>{formatCreatedAt(user.createdAt)}</td>
            <td>
              <button type="button" onClick={() => onEdit(user)} aria-label={`Edit ${user.name}`}>
                Edit
              </button>
              <button type="button" onClick={() => onDelete(user)} aria-label={`Delete ${user.name}`}>
                Delete
              </button>
            </td>
          </tr>
        ))}
      </tbody>
    </table>
  );
};

export default UserTable;
