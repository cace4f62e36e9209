import { useCallback, useState } from 'react';
import { errorsByField, INITIAL_FORM_INPUT, submitTodo, updateTodo, type TodoFormInput } from './todoForm';
import type { TodoStore } from './todoStore';
import type { TodoFormField } from './types';

export interface TodoFormState {
  input: TodoFormInput;
  errors: Partial<Record<TodoFormField, string>>;
  editingIndex: number | null;
  setField: (field: keyof TodoFormInput, value: string) => void;
  submit: () => boolean;
  startEditing: (index: number) => void;
  cancelEditing: () => void;
}

/**
 * Form state for creating (or editing) a todo.
 * A successful submit resets every field to its initial value.
 */
export function useTodoForm(store: TodoStore): TodoFormState {
  const [input, setInput] = useState<TodoFormInput>({ ...INITIAL_FORM_INPUT });
  const [errors, setErrors] = useState<Partial<Record<TodoFormField, string>>>({});
  const [editingIndex, setEditingIndex] = useState<number | null>(null);

  const reset = useCallback(() => {
    setInput({ ...INITIAL_FORM_INPUT });
    setErrors({});
    setEditingIndex(null);
  }, []);

  const setField = useCallback((field: keyof TodoFormInput, value: string) => {
    setInput(prev => ({ ...prev, [field]: value }));
  }, []);

  const submit = useCallback((): boolean => {
    const result = editingIndex === null
      ? submitTodo(store, input.title, input.description, input.priorityLabel)
      : updateTodo(store, editingIndex, input.title, input.description, input.priorityLabel);

    if (!result.ok) {
      setErrors(errorsByField(result.error));
      return false;
    }

    reset();
    return true;
  }, [store, input, editingIndex, reset]);

  const startEditing = useCallback((index: number) => {
    const todo = store.all()[index];
    if (!todo) return;

    setInput({
      title: todo.title,
      description: todo.description,
      priorityLabel: todo.priority.title
    });
    setErrors({});
    setEditingIndex(index);
  }, [store]);

  return { input, errors, editingIndex, setField, submit, startEditing, cancelEditing: reset };
}
