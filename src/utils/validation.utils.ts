import { z } from 'zod';
import { ValidationError } from '../middleware/error.middleware';

export const USERNAME_PATTERN = /^[A-Za-z0-9_]{6,20}$/;
export const PASSWORD_PATTERN = /^(?=.*[a-z])(?=.*[A-Z])(?=.*\d)(?=.*[@$!%*?&]).{8,}$/;
export const PROJECT_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

export const usernameSchema = z
  .string({ required_error: 'username is required' })
  .regex(
    USERNAME_PATTERN,
    'Invalid username format: must be 6-20 characters of letters, digits or underscore'
  );

export const passwordSchema = z
  .string({ required_error: 'password is required' })
  .regex(
    PASSWORD_PATTERN,
    'Invalid password format: must be at least 8 characters with an uppercase letter, ' +
      'a lowercase letter, a digit and one of @$!%*?&'
  );

export const apiKeySchema = z
  .string({ required_error: 'api_key is required' })
  .trim()
  .min(1, 'api_key must not be empty')
  .max(512, 'api_key is too long');

export const projectNameSchema = z
  .string({ required_error: 'project_name is required' })
  .max(100, 'Invalid project name: at most 100 characters')
  .regex(PROJECT_NAME_PATTERN, 'Invalid project name: use only letters, digits, underscore and hyphen');

// ============================================
// Request bodies
// ============================================

/** The key may arrive as `api_key` or under the older `gemini_api_key` name */
export const registerBodySchema = z
  .object({
    username: usernameSchema,
    password: passwordSchema,
    api_key: apiKeySchema.optional(),
    gemini_api_key: apiKeySchema.optional(),
    email: z.string().email('Invalid email address').optional(),
  })
  .transform((body, ctx) => {
    const apiKey = body.api_key ?? body.gemini_api_key;
    if (apiKey === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['api_key'], message: 'api_key is required' });
      return z.NEVER;
    }
    return { username: body.username, password: body.password, api_key: apiKey, email: body.email };
  });

/** Accepts OAuth2 password-form field names as well as JSON */
export const loginBodySchema = z.object({
  username: z.string({ required_error: 'username is required' }).min(1, 'username is required'),
  password: z.string({ required_error: 'password is required' }).min(1, 'password is required'),
  new_api_key: z.string().trim().optional(),
  scope: z.string().trim().optional(),
});

export const updateApiKeyBodySchema = z.object({
  new_api_key: apiKeySchema,
});

export const createProjectBodySchema = z.object({
  project_name: projectNameSchema,
});

export const supervisorBodySchema = z.object({
  message: z.string({ required_error: 'message is required' }).trim().min(1, 'message must not be empty').max(20000),
  project: projectNameSchema.optional(),
});

export type RegisterBody = z.infer<typeof registerBodySchema>;
export type LoginBody = z.infer<typeof loginBodySchema>;
export type UpdateApiKeyBody = z.infer<typeof updateApiKeyBodySchema>;
export type CreateProjectBody = z.infer<typeof createProjectBodySchema>;
export type SupervisorBody = z.infer<typeof supervisorBodySchema>;

/**
 * Parse a value, reporting the first violated rule verbatim
 */
export function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  statusCode?: number
): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const message = issue ? issue.message : 'Invalid input';
    throw new ValidationError(message, statusCode);
  }
  return result.data;
}
