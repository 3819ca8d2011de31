import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['src/**/*.test.ts'],
        coverage: {
            include: ['src'],
            reporter: ['json', 'json-summary', 'text']
        }
    }
});
