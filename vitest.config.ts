import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    testTimeout: 20000,
    hookTimeout: 20000,
    setupFiles: ['tests/setup.ts'],
    env: {
      // Keep CLI output deterministic regardless of the developer's terminal.
      FORCE_COLOR: '0',
      TD_COLOR: 'never'
    }
  },
})
