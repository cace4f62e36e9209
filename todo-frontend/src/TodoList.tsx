import React from 'react';
import { AlertCircle, ArrowDown, Star, StarHalf, type LucideIcon } from 'lucide-react';
import { withOpacity } from './colors';
import type { TodoDisplayRecord } from './presenter';
import { currentColorScheme, currentTextStyles } from './theme';
import { useAppTheme } from './ThemeContext';
import type { PriorityIcon } from './types';

export const priorityIcons = {
  'priority-high': AlertCircle,
  'star': Star,
  'star-half': StarHalf,
  'low-priority': ArrowDown
} as const satisfies Record<PriorityIcon, LucideIcon>;

interface TodoListProps {
  records: readonly TodoDisplayRecord[];
  onSelect?: (index: number) => void;
}

const TodoList: React.FC<TodoListProps> = ({ records, onSelect }) => {
  const theme = useAppTheme();
  const scheme = currentColorScheme(theme);
  const text = currentTextStyles(theme);

  if (records.length === 0) {
    return (
      <p style={{ textAlign: 'center', color: scheme.outline, fontSize: text.bodyLarge.fontSize }}>
        No todos yet. Add one above.
      </p>
    );
  }

  return (
    <ul aria-label="Todos" style={{ listStyle: 'none', margin: 0, padding: 0 }}>
      {records.map((record, index) => {
        const Icon = priorityIcons[record.priorityIcon];
        return (
          <li key={index} style={{ padding: '8px' }}>
            <div
              role={onSelect ? 'button' : undefined}
              tabIndex={onSelect ? 0 : undefined}
              onClick={onSelect ? () => onSelect(index) : undefined}
              style={{
                display: 'flex',
                alignItems: 'stretch',
                backgroundColor: withOpacity(record.priorityColor.base, 0.5),
                borderRadius: theme.container.borderRadius,
                overflow: 'hidden',
                cursor: onSelect ? 'pointer' : 'default'
              }}
            >
              <div style={{ display: 'flex', alignItems: 'center', padding: '10px 10px 10px 5px' }}>
                <Icon aria-hidden="true" size={24} />
              </div>
              <div style={{ flex: 1, padding: '10px 0', minWidth: 0 }}>
                <div style={{ fontSize: 20, fontWeight: 700, color: scheme.onBackground }}>
                  {record.label}
                </div>
                <div style={{ fontSize: 16, color: scheme.onBackground }}>
                  {record.description}
                </div>
              </div>
              <div style={{
                display: 'flex',
                alignItems: 'center',
                justifyContent: 'center',
                minHeight: '80px',
                padding: '4px',
                backgroundColor: record.priorityColor.strong,
                fontSize: text.titleMedium.fontSize,
                fontWeight: text.titleMedium.fontWeight,
                color: '#ffffff'
              }}>
                {record.priorityLabel}
              </div>
            </div>
          </li>
        );
      })}
    </ul>
  );
};

export default TodoList;
