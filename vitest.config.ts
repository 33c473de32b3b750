import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import tsconfigPaths from 'vite-tsconfig-paths';

const resolve = (dir: string): string => fileURLToPath(new URL(dir, import.meta.url));

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    setupFiles: ['tests/setup.ts'],
    environment: 'node',
    globals: true,
    include: [
      'core/**/*.test.ts',
      'cli/**/*.test.ts',
      'api/**/*.test.ts'
    ],
    exclude: [
      'node_modules',
      'dist'
    ],
    alias: {
      '@core': resolve('./core'),
      '@cli': resolve('./cli'),
      '@api': resolve('./api'),
      '@tests': resolve('./tests')
    }
  }
});
