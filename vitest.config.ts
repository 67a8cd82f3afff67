import { defineConfig } from 'vitest/config'
import react from '@vitejs/plugin-react'

export default defineConfig({
  plugins: [react()],
  test: {
    include: ['app/frontend/src/**/*.test.{ts,tsx}'],
    environment: 'node',
    restoreMocks: true,
  },
})
