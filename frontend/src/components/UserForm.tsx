// frontend/src/components/UserForm.tsx
import type { ChangeEvent, FC, FormEvent } from 'react';
import type { UserFormData } from '../types';

interface UserFormProps {
  formData: UserFormData;
  isEditing: boolean;
  isSubmitting: boolean;
  onChange: (field: keyof UserFormData, value: string) => void;
  onSubmit: () => void;
  onCancel: () => void;
}

const isFormField = (name: string): name is keyof UserFormData =>
  name === 'name' || name === 'email' || name === 'phone';

const UserForm: FC<UserFormProps> = ({ formData, isEditing, isSubmitting, onChange, onSubmit, onCancel }) => {
  const handleInputChange = (e: ChangeEvent<HTMLInputElement>) => {
    const { name, value } = e.target;
    if (isFormField(name)) onChange(name, value);
  };

  const handleSubmit = (e: FormEvent) => {
    e.preventDefault();
    onSubmit();
  };

  let submitLabel = isEditing ? 'Update User' : 'Create User';
  if (isSubmitting) submitLabel = 'Processing...';

  return (
    <form onSubmit={handleSubmit} className="user-form" noValidate>
      <h2>{isEditing ? 'Edit User' : 'Add New User'}</h2>

      <div>
        <label htmlFor="name">Name *</label>
        <input type="text" id="name" name="name" value={formData.name} onChange={handleInputChange} required />
      </div>

      <div>
        <label htmlFor="email">Email *</label>
        <input type="email" id="email" name="email" value={formData.email} onChange={handleInputChange} required />
      </div>

      <div>
        <label htmlFor="phone">Phone</label>
        <input type="tel" id="phone" name="phone" value={formData.phone} onChange={handleInputChange} />
      </div>

      <div className="form-actions">
        <button type="submit" disabled={isSubmitting}>
          {submitLabel}
        </button>
        {isEditing && (
          <button type="button" onClick={onCancel}>
            Cancel
          </button>
        )}
      </div>
    </form>
  );
};

export default UserForm;
