import { defineConfig } from 'vitest/config';
import react from '@vitejs/plugin-react';

export default defineConfig({
  plugins: [react()],
  test: {
    environment: 'node',
    include: ['services/**/*.test.ts', 'components/**/*.test.tsx', '*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
  },
});
