import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    index: 'src/index.ts',
    bin: 'src/bin.ts',
  },
  format: ['cjs'],
  dts: false,
  sourcemap: true,
  clean: true,
  splitting: false,
  treeshake: true,
  // Workspace packages point at their TypeScript sources, so bundle them into the binary.
  noExternal: [/^@lakeshift\//],
});
