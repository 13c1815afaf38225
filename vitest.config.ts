import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const resolveSource = (relative: string): string =>
  fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@region-ocr/core': resolveSource('./packages/core/src/index.ts'),
      '@region-ocr/ocr-tesseract': resolveSource('./packages/ocr/tesseract/src/index.ts'),
      '@region-ocr/ocr-google-vision': resolveSource('./packages/ocr/google-vision/src/index.ts'),
    },
  },
  test: {
    globals: false,
    environment: 'node',
    include: ['packages/**/tests/**/*.test.ts'],
    testTimeout: 20000,
  },
});
