import { z } from 'zod';
import { WORK_ITEM_KINDS, WORK_ITEM_STATES } from '@shared/constants';

export const workItemKindSchema = z.enum(WORK_ITEM_KINDS);
export const workItemStateSchema = z.enum(WORK_ITEM_STATES);

// initialState accepts any lifecycle state; the tracker decides whether it is
// a valid starting point.
export const createItemSchema = z.object({
  kind: workItemKindSchema,
  initialState: workItemStateSchema.default('BACKLOG'),
  id: z.string().trim().min(1).optional(),
});

export const transitionRequestSchema = z.object({
  targetState: workItemStateSchema,
  actor: z.string().trim().min(1),
});

export const listItemsQuerySchema = z.object({
  state: workItemStateSchema.optional(),
  kind: workItemKindSchema.optional(),
  assignee: z.string().min(1).optional(),
});

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

export function validateRequest<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
): ValidationResult<z.infer<S>> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const [issue] = result.error.issues;
    const location = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return { success: false, error: `${location}${issue?.message ?? 'Invalid request'}` };
  }
  return { success: true, data: result.data };
}
