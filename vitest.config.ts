import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    env: {
      MONGODB_URI: 'mongodb://127.0.0.1:27017/placement-test',
      GOOGLE_CLIENT_ID: 'test-client-id',
      GOOGLE_CLIENT_SECRET: 'test-secret',
      NEXTAUTH_SECRET: 'test-secret',
      ADMIN_EMAILS: 'admin@example.com',
    },
  },
});
