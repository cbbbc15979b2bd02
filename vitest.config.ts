import { defineConfig } from 'vitest/config'
import { fileURLToPath } from 'node:url'

export default defineConfig({
  resolve: {
    alias: {
      "@": fileURLToPath(new URL('./src', import.meta.url))
    }
  },
  test: {
    globals: true,
    environment: 'node',
    pool: 'threads',
    projects: [
      {
        extends: true,
        test:{
          name: 'integration',
          include: [
            'src/**/infrastructure/*.{spec,test}.ts',
            'src/**/application/*.{spec,test}.ts',
            'src/api/**/*.{spec,test}.ts',
          ],
        }
      },
      {
        extends: true,
        test: {
          name: 'unit',
          include: ['src/**/*.{spec,test}.ts'],
          exclude: [
            'src/**/infrastructure/*.{spec,test}.ts',
            'src/**/application/*.{spec,test}.ts',
            'src/api/**/*.{spec,test}.ts',
          ],
        }
      }
    ]
  }
})
