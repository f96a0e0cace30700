import { defineConfig } from 'tsup';

export default defineConfig({
    entry: {
        index: 'src/index.ts',
        cli: 'src/cli.ts',
    },
    format: ['cjs', 'esm'],
    dts: { entry: { index: 'src/index.ts' } },
    splitting: false,
    clean: true,
});
