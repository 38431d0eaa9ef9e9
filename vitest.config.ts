import { defineConfig } from 'vitest/config';
import react from '@vitejs/plugin-react';
import vue from '@vitejs/plugin-vue';

export default defineConfig({
  plugins: [react(), vue()],
  test: {
    setupFiles: ['tests/setup.ts'],
    environment: 'jsdom',
    include: ['__test__/**/*.test.{ts,tsx}'],
  },
});
