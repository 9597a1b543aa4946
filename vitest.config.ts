import { fileURLToPath } from 'node:url'
import react from '@vitejs/plugin-react'
import { defineConfig } from 'vitest/config'

export default defineConfig({
    plugins: [react()],
    resolve: {
        alias: {
            '@': fileURLToPath(new URL('./src', import.meta.url))
        }
    },
    test: {
        // component tests opt into jsdom with a file-level docblock
        environment: 'node',
        include: ['src/**/*.test.ts', 'src/**/*.test.tsx'],
        restoreMocks: true
    }
})
