import { defineConfig } from 'vitest/config';
import react from '@vitejs/plugin-react';

export default defineConfig({
  plugins: [react()],
  test: {
    environment: 'jsdom',
    include: ['todo-frontend/src/**/*.test.{ts,tsx}'],
    setupFiles: ['todo-frontend/src/setupTests.ts']
  }
});
