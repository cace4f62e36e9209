import type { Todo } from './types';

type Listener = () => void;

/**
 * In-memory, insertion-ordered collection of todos for one screen session.
 *
 * `subscribe` and `all` are bound so they can be handed straight to
 * `useSyncExternalStore`. `all()` keeps returning the same frozen snapshot
 * until the next mutation.
 */
export class TodoStore {
  private readonly todos: Todo[];
  private snapshot: readonly Todo[] | null = null;
  private readonly listeners = new Set<Listener>();

  constructor(initial: readonly Todo[] = []) {
    this.todos = [...initial];
  }

  get size(): number {
    return this.todos.length;
  }

  add(todo: Todo): void {
    this.todos.push(todo);
    this.changed();
  }

  replace(index: number, todo: Todo): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.todos.length) {
      throw new RangeError(`No todo at index ${index} (size ${this.todos.length})`);
    }
    this.todos[index] = todo;
    this.changed();
  }

  clear(): void {
    if (this.todos.length === 0) return;
    this.todos.length = 0;
    this.changed();
  }

  all = (): readonly Todo[] => {
    if (this.snapshot === null) {
      this.snapshot = Object.freeze([...this.todos]);
    }
    return this.snapshot;
  };

  subscribe = (listener: Listener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  private changed(): void {
    this.snapshot = null;
    this.listeners.forEach((listener) => listener());
  }
}
