import typescript from '@rollup/plugin-typescript'
import { puyaTsTransformer } from '@algorandfoundation/algorand-typescript-testing/vitest-transformer'
import { defineConfig } from 'vitest/config'

export default defineConfig({
  esbuild: {},
  plugins: [
    typescript({
      tsconfig: './tsconfig.json',
      transformers: {
        before: [
          puyaTsTransformer({
            includeExt: [
              '.algo.ts',
              '.algo.spec.ts',
              '.algo.test.ts',
              // Specs and fixtures that drive the contracts through the testing context
              'claim_lock/contract.spec.ts',
              'claim_lock/helper-resolution.spec.ts',
              'smart_contracts/integration.spec.ts',
              'testing/claim-lock.fixture.ts',
            ],
          }),
        ],
      },
    }),
  ],
  test: {
    globals: true,
    environment: 'node',
    include: ['smart_contracts/**/*.spec.ts'],
    setupFiles: 'vitest.setup.ts',
    // Operator specs silence console output with spies
    restoreMocks: true,
    pool: 'forks',
  },
})
