// frontend/src/types.ts

export interface User {
  id: number;
  name: string;
  email: string;
  phone: string | null;
  createdAt: string; // ISO-8601 from the API
}

// Raw form state; every field is a string while the user is typing.
export interface UserFormData {
  name: string;
  email: string;
  phone: string;
}

export interface UserPayload {
  name: string;
  email: string;
  phone: string | null;
}

export interface ApiErrorBody {
  error: {
    code: string;
    message: string;
  };
}
