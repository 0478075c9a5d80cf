import { z } from 'zod';
import { VALID_ROLES, parseRole } from '../common/roles.js';

export const UsernameSchema = z
  .string({ required_error: 'This field is required.' })
  .trim()
  .min(3, 'Ensure this field has at least 3 characters.')
  .max(150, 'Ensure this field has no more than 150 characters.')
  .regex(/^[\w.@+-]+$/, 'Enter a valid username. This value may contain only letters, numbers, and @/./+/-/_ characters.');

export const RegisterRequestSchema = z.object({
  username: UsernameSchema,
  password: z
    .string({ required_error: 'This field is required.' })
    .min(8, 'This password is too short. It must contain at least 8 characters.')
    .max(128, 'Ensure this field has no more than 128 characters.'),
  email: z.string().trim().email('Enter a valid email address.').optional(),
  bio: z.string().max(500, 'Ensure this field has no more than 500 characters.').optional(),
});
export type RegisterRequest = z.infer<typeof RegisterRequestSchema>;

export const LoginRequestSchema = z.object({
  username: z.string({ required_error: 'This field is required.' }).trim().min(1, 'This field may not be blank.'),
  password: z.string({ required_error: 'This field is required.' }).min(1, 'This field may not be blank.'),
});
export type LoginRequest = z.infer<typeof LoginRequestSchema>;

export const RoleSchema = z
  .string({ required_error: 'This field is required.' })
  .transform((value, ctx) => {
    const role = parseRole(value);
    if (!role) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `"${value}" is not a valid choice. Choose one of: ${VALID_ROLES.join(', ')}.`,
      });
      return z.NEVER;
    }
    return role;
  });

export const UpdateRoleRequestSchema = z.object({ role: RoleSchema });
export type UpdateRoleRequest = z.infer<typeof UpdateRoleRequestSchema>;
