import { existsSync } from 'node:fs';
import react from '@vitejs/plugin-react';
import { defineConfig } from 'vitest/config';

// Inside a container the dev server has to listen on all interfaces so the
// phone on the same network can reach the camera capture page.
function isRunningInContainer(): boolean {
  return existsSync('/.dockerenv');
}

const devHost = isRunningInContainer() ? '0.0.0.0' : 'localhost';

// https://vite.dev/config/
export default defineConfig({
  plugins: [react()],
  server: {
    host: devHost,
  },
  build: {
    outDir: 'dist',
  },
  test: {
    environment: 'jsdom',
    globals: true,
    setupFiles: ['./src/test-utils/setupTests.ts'],
    include: ['src/**/*.test.{ts,tsx}'],
  },
});
