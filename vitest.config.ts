import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./src/test/setup.ts'],
    include: ['src/**/*.{test,spec}.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: [
        'src/services/**/*.ts',
        'src/domain/**/*.ts',
        'src/infrastructure/**/*.ts'
      ],
      exclude: [
        'src/test/**',
        '**/*.d.ts',
        '**/*.test.ts',
        '**/index.ts'
      ]
    },
    testTimeout: 20000,
    hookTimeout: 20000
  }
})
