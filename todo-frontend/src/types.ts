// ===============================================
// DATA MODELS FOR TODO APP
// ===============================================

// Severity levels - URGENT is highest, LOW is lowest
export enum PriorityLevel {
  URGENT = 'urgent',
  HIGH = 'high',
  MEDIUM = 'medium',
  LOW = 'low'
}

// Symbolic icon names, mapped to icon components by the list view
export type PriorityIcon = 'priority-high' | 'star' | 'star-half' | 'low-priority';

// Background tint and the darker shade used for the priority badge
export interface PriorityColor {
  base: string;
  strong: string;
}

// PRIORITY INTERFACE
export interface Priority {
  readonly level: PriorityLevel;
  readonly rank: number;        // 0 = most severe
  readonly title: string;       // Display label: "Urgent", "High", ...
  readonly color: PriorityColor;
  readonly icon: PriorityIcon;
}

// TODO INTERFACE - edits replace the whole record
export interface Todo {
  readonly title: string;
  readonly description: string;
  readonly priority: Priority;
}

// Form fields that can carry a validation error
export type TodoFormField = 'title' | 'description' | 'priority';

// Validation failures reported by the creation form
export enum ValidationErrorCode {
  EMPTY_TITLE = 'EmptyTitle',
  TITLE_TOO_LONG = 'TitleTooLong',
  EMPTY_DESCRIPTION = 'EmptyDescription',
  DESCRIPTION_TOO_LONG = 'DescriptionTooLong',
  NO_PRIORITY_SELECTED = 'NoPrioritySelected',
  UNKNOWN_PRIORITY = 'UnknownPriority'
}

export interface ValidationError {
  field: TodoFormField;
  code: ValidationErrorCode;
  message: string;
}

export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// Form limits
export const TITLE_MAX_LENGTH = 20;
export const DESCRIPTION_MIN_LENGTH = 5;
export const DESCRIPTION_MAX_LENGTH = 40;
