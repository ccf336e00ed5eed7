import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const workspace = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@suiconf/types': workspace('./packages/types/src/index.ts'),
      '@suiconf/crypto': workspace('./packages/crypto/src/index.ts'),
      '@suiconf/data-model': workspace('./packages/data-model/src/index.ts'),
      '@suiconf/config-engine': workspace('./packages/config-engine/src/index.ts')
    }
  },
  test: {
    include: ['packages/*/src/**/*.test.ts', 'tools/scripts/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    watch: false,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov', 'text-summary'],
      include: ['packages/*/src/**/*.ts', 'tools/scripts/*/src/**/*.ts'],
      exclude: [
        '**/*.test.ts',
        // Re-export index files
        'packages/*/src/index.ts',
        // Test-only fixtures
        'packages/config-engine/src/testDocuments.ts',
        // Process entry point; commands are covered through runCli
        'tools/scripts/suiconf/src/index.ts'
      ]
    }
  }
});
