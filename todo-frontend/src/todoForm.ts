import { z } from 'zod';
import { DEFAULT_PRIORITY, priorityByLabel } from './priorities';
import type { TodoStore } from './todoStore';
import {
  DESCRIPTION_MAX_LENGTH,
  DESCRIPTION_MIN_LENGTH,
  type Priority,
  type Result,
  TITLE_MAX_LENGTH,
  type Todo,
  type TodoFormField,
  type ValidationError,
  ValidationErrorCode
} from './types';

export interface TodoFormInput {
  title: string;
  description: string;
  priorityLabel: string;
}

export interface ValidatedTodoInput {
  title: string;
  description: string;
  priority: Priority;
}

export const INITIAL_FORM_INPUT: Readonly<TodoFormInput> = Object.freeze({
  title: '',
  description: '',
  priorityLabel: DEFAULT_PRIORITY.title
});

const FORM_FIELDS: readonly TodoFormField[] = ['title', 'description', 'priority'];
const ERROR_CODES: readonly string[] = Object.values(ValidationErrorCode);

const failWith = (code: ValidationErrorCode, message: string) => ({ message, params: { code } });

const isValidationErrorCode = (value: unknown): value is ValidationErrorCode =>
  typeof value === 'string' && ERROR_CODES.includes(value);

const isFormField = (value: unknown): value is TodoFormField =>
  typeof value === 'string' && FORM_FIELDS.some((field) => field === value);

// Lengths are UTF-16 code units, the unit the inputs' maxLength clamps by
const todoInputSchema = z.object({
  title: z
    .string()
    .refine((title) => title.trim().length > 0, failWith(ValidationErrorCode.EMPTY_TITLE, 'Please enter a title'))
    .refine(
      (title) => title.length <= TITLE_MAX_LENGTH,
      failWith(ValidationErrorCode.TITLE_TOO_LONG, `Title must be at most ${TITLE_MAX_LENGTH} characters`)
    ),
  description: z
    .string()
    .refine(
      (description) => description.trim().length >= DESCRIPTION_MIN_LENGTH,
      failWith(
        ValidationErrorCode.EMPTY_DESCRIPTION,
        `Please enter a description of at least ${DESCRIPTION_MIN_LENGTH} characters`
      )
    )
    .refine(
      (description) => description.length <= DESCRIPTION_MAX_LENGTH,
      failWith(
        ValidationErrorCode.DESCRIPTION_TOO_LONG,
        `Description must be at most ${DESCRIPTION_MAX_LENGTH} characters`
      )
    ),
  priority: z.string().transform((label, ctx): Priority => {
    if (label.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        ...failWith(ValidationErrorCode.NO_PRIORITY_SELECTED, 'Please select a priority')
      });
      return z.NEVER;
    }
    const priority = priorityByLabel(label);
    if (!priority) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        ...failWith(ValidationErrorCode.UNKNOWN_PRIORITY, `Unknown priority "${label}"`)
      });
      return z.NEVER;
    }
    return priority;
  })
});

const toValidationErrors = (issues: z.ZodIssue[]): ValidationError[] =>
  issues.flatMap((issue): ValidationError[] => {
    const field = issue.path[0];
    const code: unknown = issue.code === z.ZodIssueCode.custom ? issue.params?.code : undefined;
    if (!isFormField(field) || !isValidationErrorCode(code)) {
      return [];
    }
    return [{ field, code, message: issue.message }];
  });

/**
 * Checks raw form input. On success the title and description are returned
 * exactly as typed and the priority label is resolved against the catalog.
 */
export function validateTodoInput(
  title: string,
  description: string,
  priorityLabel: string
): Result<ValidatedTodoInput, ValidationError[]> {
  const parsed = todoInputSchema.safeParse({ title, description, priority: priorityLabel });
  if (!parsed.success) {
    return { ok: false, error: toValidationErrors(parsed.error.issues) };
  }
  return { ok: true, value: parsed.data };
}

/**
 * Validates the input and appends the new todo to the store.
 * The store is left untouched when validation fails.
 */
export function submitTodo(
  store: TodoStore,
  title: string,
  description: string,
  priorityLabel: string
): Result<Todo, ValidationError[]> {
  const result = validateTodoInput(title, description, priorityLabel);
  if (!result.ok) return result;

  const todo: Todo = { ...result.value };
  store.add(todo);
  return { ok: true, value: todo };
}

// Replace-on-edit: the entry at `index` is swapped for a new record
export function updateTodo(
  store: TodoStore,
  index: number,
  title: string,
  description: string,
  priorityLabel: string
): Result<Todo, ValidationError[]> {
  const result = validateTodoInput(title, description, priorityLabel);
  if (!result.ok) return result;

  const todo: Todo = { ...result.value };
  store.replace(index, todo);
  return { ok: true, value: todo };
}

// First message per field, for inline display
export const errorsByField = (errors: readonly ValidationError[]): Partial<Record<TodoFormField, string>> => {
  const byField: Partial<Record<TodoFormField, string>> = {};
  for (const error of errors) {
    byField[error.field] ??= error.message;
  }
  return byField;
};
