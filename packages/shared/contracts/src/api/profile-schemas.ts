import { z } from 'zod';

export const UpdateProfileRequestSchema = z.object({
  bio: z.string({ required_error: 'This field is required.' }).max(500, 'Ensure this field has no more than 500 characters.'),
});
export type UpdateProfileRequest = z.infer<typeof UpdateProfileRequestSchema>;
