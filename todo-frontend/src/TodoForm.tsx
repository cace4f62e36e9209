import React from 'react';
import { priorityLabels } from './priorities';
import { currentColorScheme, currentTextStyles } from './theme';
import { useAppTheme } from './ThemeContext';
import ThemedContainer from './ThemedContainer';
import { DESCRIPTION_MAX_LENGTH, TITLE_MAX_LENGTH } from './types';
import type { TodoFormState } from './useTodoForm';

interface TodoFormProps {
  form: TodoFormState;
}

const TodoForm: React.FC<TodoFormProps> = ({ form }) => {
  const theme = useAppTheme();
  const scheme = currentColorScheme(theme);
  const text = currentTextStyles(theme);
  const { input, errors, editingIndex, setField, submit, cancelEditing } = form;

  const labelStyle: React.CSSProperties = {
    display: 'block',
    marginBottom: '0.5rem',
    fontWeight: 600,
    fontSize: text.labelLarge.fontSize,
    color: scheme.onSurface
  };

  const fieldStyle = (hasError: boolean): React.CSSProperties => ({
    width: '100%',
    padding: '1rem',
    border: `2px solid ${hasError ? scheme.error : scheme.outline}`,
    borderRadius: '12px',
    fontSize: text.bodyLarge.fontSize,
    boxSizing: 'border-box',
    minHeight: '48px',
    fontFamily: 'inherit',
    backgroundColor: scheme.background,
    color: scheme.onBackground,
    WebkitAppearance: 'none',
    appearance: 'none'
  });

  const errorStyle: React.CSSProperties = {
    margin: '0.25rem 0 0 0',
    color: scheme.error,
    fontSize: text.bodySmall.fontSize
  };

  const handleSubmit = (e: React.FormEvent) => {
    e.preventDefault();
    submit();
  };

  return (
    <ThemedContainer style={{ marginBottom: '1.5rem' }}>
      <form onSubmit={handleSubmit} noValidate style={{ display: 'grid', gap: '1.25rem' }}>
        <h2 style={{ margin: 0, fontSize: text.titleLarge.fontSize, fontWeight: text.titleLarge.fontWeight, color: scheme.onSurface }}>
          {editingIndex === null ? 'New Todo' : 'Edit Todo'}
        </h2>

        {/* Title */}
        <div>
          <label htmlFor="todo-title" style={labelStyle}>Title</label>
          <input
            id="todo-title"
            type="text"
            value={input.title}
            maxLength={TITLE_MAX_LENGTH}
            onChange={(e) => setField('title', e.target.value)}
            placeholder="What needs to be done?"
            aria-invalid={errors.title !== undefined}
            style={fieldStyle(errors.title !== undefined)}
          />
          {errors.title && <p role="alert" style={errorStyle}>{errors.title}</p>}
        </div>

        {/* Description */}
        <div>
          <label htmlFor="todo-description" style={labelStyle}>Description</label>
          <textarea
            id="todo-description"
            value={input.description}
            maxLength={DESCRIPTION_MAX_LENGTH}
            onChange={(e) => setField('description', e.target.value)}
            placeholder="Add some details"
            aria-invalid={errors.description !== undefined}
            style={{ ...fieldStyle(errors.description !== undefined), minHeight: '80px', resize: 'none' }}
          />
          {errors.description && <p role="alert" style={errorStyle}>{errors.description}</p>}
        </div>

        {/* Priority */}
        <div>
          <label htmlFor="todo-priority" style={labelStyle}>Priority</label>
          <select
            id="todo-priority"
            value={input.priorityLabel}
            onChange={(e) => setField('priorityLabel', e.target.value)}
            aria-invalid={errors.priority !== undefined}
            style={fieldStyle(errors.priority !== undefined)}
          >
            {priorityLabels().map((label) => (
              <option key={label} value={label}>{label}</option>
            ))}
          </select>
          {errors.priority && <p role="alert" style={errorStyle}>{errors.priority}</p>}
        </div>

        {/* Form Buttons */}
        <div style={{ display: 'flex', gap: '0.75rem' }}>
          <button
            type="submit"
            style={{
              flex: 1,
              backgroundColor: scheme.primary,
              color: scheme.onPrimary,
              border: 'none',
              padding: '1rem',
              borderRadius: '12px',
              fontSize: text.labelLarge.fontSize,
              fontWeight: 600,
              cursor: 'pointer',
              minHeight: '48px'
            }}
          >
            {editingIndex === null ? 'Add Todo' : 'Save'}
          </button>
          {editingIndex !== null && (
            <button
              type="button"
              onClick={cancelEditing}
              style={{
                backgroundColor: 'transparent',
                color: scheme.onSurface,
                border: `1px solid ${scheme.outline}`,
                padding: '1rem',
                borderRadius: '12px',
                fontSize: text.labelLarge.fontSize,
                cursor: 'pointer',
                minHeight: '48px'
              }}
            >
              Cancel
            </button>
          )}
        </div>
      </form>
    </ThemedContainer>
  );
};

export default TodoForm;
