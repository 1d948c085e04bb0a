import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const src = (sub = '') =>
  fileURLToPath(new URL(`./src/${sub}`, import.meta.url)).replace(/\/$/, '')

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    pool: 'forks',
    include: ['test/**/*.test.ts'],
    globalSetup: './test/setup/global-setup.ts',
    testTimeout: 10000,
    hookTimeout: 10000,
    server: {
      deps: {
        // Let autoload's dynamic imports of .ts plugins go through Vite
        inline: ['@fastify/autoload'],
      },
    },
  },
  resolve: {
    alias: [
      // Map .js imports to .ts files for path aliases
      { find: /^@root\/(.*)\.js$/, replacement: src('$1.ts') },
      { find: /^@services\/(.*)\.js$/, replacement: src('services/$1.ts') },
      { find: /^@plugins\/(.*)\.js$/, replacement: src('plugins/$1.ts') },
      { find: /^@utils\/(.*)\.js$/, replacement: src('utils/$1.ts') },
      { find: /^@schemas\/(.*)\.js$/, replacement: src('schemas/$1.ts') },
      // Regular aliases without .js extension
      { find: '@root', replacement: src() },
      { find: '@services', replacement: src('services') },
      { find: '@plugins', replacement: src('plugins') },
      { find: '@utils', replacement: src('utils') },
      { find: '@schemas', replacement: src('schemas') },
    ],
    extensions: ['.ts', '.js', '.json'],
  },
})
