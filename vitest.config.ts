import { defineConfig } from 'vitest/config'
import { unitTestMinimalProject } from './configs/vitest.config.unit-minimal'

export default defineConfig({
  test: {
    projects: [
      {
        extends: true,
        ...unitTestMinimalProject,
      },
    ],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
      '**/.{idea,git,cache,output,temp}/**',
    ],
    env: {
      NODE_ENV: 'test',
    },
    clearMocks: true,
    teardownTimeout: 5_000,
    onConsoleLog: () => !process.env.TEST_QUIET_CONSOLE,
    coverage: {
      enabled: false,
      include: ['packages/**/src/**.{ts}'],
      clean: true,
      provider: 'v8',
      reporter: [['lcovonly', { file: 'lcov.info' }], ['text']],
      reportsDirectory: './coverage',
      exclude: ['**/*.d.ts', '**/test/**', '**/node_modules/**'],
    },
  },
})
