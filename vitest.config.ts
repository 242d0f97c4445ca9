/// <reference types="vitest" />
import { defineConfig } from 'vitest/config'

// Конфигурация для тестирования в NodeJS
export default defineConfig({
  test: {
    include: [
      'src/**/*.test.ts'
    ],
    environment: 'node',
    fileParallelism: false
  }
})
