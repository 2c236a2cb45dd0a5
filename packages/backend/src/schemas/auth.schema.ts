import { z } from 'zod';

/**
 * Schema for user registration
 */
export const RegisterSchema = z.object({
  username: z
    .string()
    .trim()
    .min(3, 'Username must be at least 3 characters')
    .max(50, 'Username too long')
    .regex(/^[A-Za-z0-9_.-]+$/, 'Username may only contain letters, digits, underscores, dots and dashes'),
  email: z.string().trim().toLowerCase().email('Invalid email address').max(255),
  password: z
    .string()
    .min(8, 'Password must be at least 8 characters')
    .max(128, 'Password too long')
    .regex(
      /^(?=.*[a-z])(?=.*[A-Z])(?=.*\d)/,
      'Password must contain at least one lowercase letter, one uppercase letter, and one number'
    ),
});

export type RegisterInput = z.infer<typeof RegisterSchema>;

/**
 * Schema for login with either the username or the email address
 */
export const LoginSchema = z.object({
  usernameOrEmail: z.string().trim().min(1, 'Username or email is required'),
  password: z.string().min(1, 'Password is required'),
});

export type LoginInput = z.infer<typeof LoginSchema>;

/**
 * User response (without sensitive fields)
 */
export const UserResponseSchema = z.object({
  id: z.string().uuid(),
  username: z.string(),
  email: z.string().email(),
  createdAt: z.date(),
});

export type UserResponse = z.infer<typeof UserResponseSchema>;

export interface AuthResponse {
  token: string;
  expiresAt: Date;
  user: UserResponse;
}
