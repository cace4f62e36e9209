import type { PriorityColor, PriorityIcon, Todo } from './types';

export interface TodoDisplayRecord {
  label: string;
  description: string;
  priorityLabel: string;
  priorityColor: PriorityColor;
  priorityIcon: PriorityIcon;
}

// Full projection of the store snapshot; recomputed on every change
export const presentTodos = (todos: readonly Todo[]): TodoDisplayRecord[] =>
  todos.map((todo) => ({
    label: todo.title,
    description: todo.description,
    priorityLabel: todo.priority.title,
    priorityColor: todo.priority.color,
    priorityIcon: todo.priority.icon
  }));
