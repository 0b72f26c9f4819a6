import { defineConfig } from 'vitest/config';
import react from '@vitejs/plugin-react';

export default defineConfig({
  plugins: [react()],

  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./backend/src/__helpers__/setup.ts'],
    include: ['backend/src/**/*.test.ts', 'frontend/src/**/*.test.tsx'],
  },
});
