import { defineConfig } from '@codetable/tsup-config';

export default defineConfig({
  entry: {
    index: 'src/index.ts',
  },
});
