import { HIGH, LOW, MEDIUM, URGENT } from './priorities';
import type { Todo } from './types';

// Seed data, loaded only when VITE_SEED_TODOS=true
export const sampleTodos: readonly Todo[] = [
  { title: 'Buy groceries', description: 'Milk, eggs and bread', priority: MEDIUM },
  { title: 'Finish homework', description: 'Math and science worksheets', priority: HIGH },
  { title: 'Go for a run', description: '5 km in the park', priority: LOW },
  { title: 'Call mom', description: 'Wish her a happy birthday', priority: URGENT }
];
