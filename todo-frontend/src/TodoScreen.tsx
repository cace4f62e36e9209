import React, { useEffect, useMemo, useState, useSyncExternalStore } from 'react';
import { presentTodos } from './presenter';
import { currentColorScheme, currentTextStyles } from './theme';
import { useAppTheme } from './ThemeContext';
import TodoForm from './TodoForm';
import TodoList from './TodoList';
import { TodoStore } from './todoStore';
import type { Todo } from './types';
import { useTodoForm } from './useTodoForm';

interface TodoScreenProps {
  initialTodos?: readonly Todo[];
}

// Home screen: the store lives exactly as long as this screen is mounted
const TodoScreen: React.FC<TodoScreenProps> = ({ initialTodos = [] }) => {
  const [store] = useState(() => new TodoStore(initialTodos));
  const todos = useSyncExternalStore(store.subscribe, store.all);
  const records = useMemo(() => presentTodos(todos), [todos]);
  const form = useTodoForm(store);

  const theme = useAppTheme();
  const scheme = currentColorScheme(theme);
  const text = currentTextStyles(theme);

  useEffect(() => () => store.clear(), [store]);

  return (
    <div style={{ minHeight: '100vh', backgroundColor: scheme.background, color: scheme.onBackground }}>
      <header style={{ padding: '1rem', textAlign: 'center' }}>
        <h1 style={{
          margin: 0,
          fontSize: text.headlineSmall.fontSize,
          fontWeight: text.headlineSmall.fontWeight,
          color: scheme.primary
        }}>
          Todo App
        </h1>
      </header>

      <main style={{ padding: '0 1rem 2rem', maxWidth: '640px', margin: '0 auto' }}>
        <TodoForm form={form} />
        <TodoList records={records} onSelect={form.startEditing} />
      </main>
    </div>
  );
};

export default TodoScreen;
