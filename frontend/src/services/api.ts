// frontend/src/services/api.ts
import type { ApiErrorBody, User, UserFormData, UserPayload } from '../types';
import { logger } from '../utils/logger';

const API_BASE_URL = (import.meta.env.VITE_API_BASE_URL ?? 'http://localhost:3000').replace(/\/+$/, '');

export const USERS_URL = `${API_BASE_URL}/users`;

// Carries the HTTP status and the backend's error code, when it sent one.
export class ApiError extends Error {
  public status: number;
  public code: string | null;

  constructor(message: string, status: number, code: string | null = null) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
    this.code = code;
  }
}

function isApiErrorBody(value: unknown): value is ApiErrorBody {
  if (typeof value !== 'object' || value === null || !('error' in value)) return false;
  const { error } = value;
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string' &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

const handleResponse = async <T>(response: Response): Promise<T> => {
  if (!response.ok) {
    let body: unknown = null;
    try {
      body = await response.json();
    } catch (e: unknown) {
      logger.debug('Error body was not JSON', e);
    }

    logger.error(`API Error (Status: ${response.status}):`, body);

    if (isApiErrorBody(body)) {
      throw new ApiError(body.error.message, response.status, body.error.code);
    }
    throw new ApiError(`Request failed with status ${response.status}`, response.status);
  }

  return response.json();
};

export const toUserPayload = (form: UserFormData): UserPayload => {
  const phone = form.phone.trim();
  return {
    name: form.name.trim(),
    email: form.email.trim(),
    phone: phone.length > 0 ? phone : null,
  };
};

const jsonRequest = (method: 'POST' | 'PUT', data: UserFormData): RequestInit => ({
  method,
  headers: {
    'Content-Type': 'application/json',
  },
  body: JSON.stringify(toUserPayload(data)),
});

export const fetchUsers = async (): Promise<User[]> => {
  const response = await fetch(USERS_URL);
  return handleResponse<User[]>(response);
};

export const searchUsers = async (name: string): Promise<User[]> => {
  const response = await fetch(`${USERS_URL}/search?name=${encodeURIComponent(name)}`);
  return handleResponse<User[]>(response);
};

export const createUser = async (data: UserFormData): Promise<User> => {
  const response = await fetch(USERS_URL, jsonRequest('POST', data));
  return handleResponse<User>(response);
};

export const updateUser = async (id: number, data: UserFormData): Promise<User> => {
  const response = await fetch(`${USERS_URL}/${id}`, jsonRequest('PUT', data));
  return handleResponse<User>(response);
};

export const deleteUser = async (id: number): Promise<{ message: string }> => {
  const response = await fetch(`${USERS_URL}/${id}`, { method: 'DELETE' });
  return handleResponse<{ message: string }>(response);
};
