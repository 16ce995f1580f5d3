// apps/api/src/lib/validation.ts
import { z } from 'zod';
import { BadRequestError } from './errors';

// stored as given; case folding only happens inside deriveEmailLookup
const email = z.string().trim().email().max(255);

export const registerBody = z.object({
  email,
  password: z.string().min(8).max(128),
  // checked against the role list by the service, so an unknown value reads as invalid_role
  role: z.string().optional(),
});

export const loginBody = z.object({
  email,
  password: z.string().min(1).max(128),
});

export const updateProfileBody = z.object({
  email: email.optional(),
  password: z.string().min(8).max(128).optional(),
});

export const updateRoleBody = z.object({
  role: z.string(),
});

export type RegisterBody = z.infer<typeof registerBody>;
export type LoginBody = z.infer<typeof loginBody>;
export type UpdateProfileBody = z.infer<typeof updateProfileBody>;

/** Parses an untrusted body, or throws BadRequest with `code`. */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown, code = 'invalid_payload'): z.output<S> {
  const result = schema.safeParse(body);
  if (!result.success) throw new BadRequestError(code);
  return result.data;
}
