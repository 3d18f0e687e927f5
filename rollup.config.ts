import { builtinModules, createRequire } from 'node:module';

import typescriptPlugin from '@rollup/plugin-typescript';
import type { InputOptions, RollupOptions } from 'rollup';
import dtsPlugin from 'rollup-plugin-dts';

const require = createRequire(import.meta.url);
type PackageJson = {
  dependencies?: Record<string, string>;
  peerDependencies?: Record<string, string>;
};
const pkg: PackageJson = require('./package.json');

// Runtime deps, peers and their subpaths stay external.
const runtimeDeps = [
  ...Object.keys(pkg.dependencies ?? {}),
  ...Object.keys(pkg.peerDependencies ?? {}),
  'tslib',
];
const runtimeDepSet = new Set(runtimeDeps);
const runtimeDepPrefixes = runtimeDeps.map((d) => `${d}/`);
const builtinSet = new Set(builtinModules);

const isExternal = (id: string): boolean => {
  if (!id || id.startsWith('\0')) return false;
  if (id.startsWith('.') || id.startsWith('/')) return false;
  const bare = id.startsWith('node:') ? id.slice(5) : id;
  if (builtinSet.has(bare) || runtimeDepSet.has(id)) return true;
  return runtimeDepPrefixes.some((p) => id.startsWith(p));
};

const outputPath = 'dist';

// Rollup writes the bundles; the TS plugin only transpiles.
const typescript = typescriptPlugin({
  tsconfig: './tsconfig.json',
  outputToFilesystem: false,
  include: ['src/**/*.ts'],
  exclude: ['**/*.test.ts', '**/__fixtures__/**'],
  noEmit: false,
  declaration: false,
  declarationMap: false,
  incremental: false,
  allowJs: false,
  checkJs: false,
});

const commonInputOptions: InputOptions = {
  input: 'src/index.ts',
  external: (id) => isExternal(id),
  plugins: [typescript],
};

export const buildLibrary = (dest: string): RollupOptions => ({
  ...commonInputOptions,
  output: [
    { dir: `${dest}/mjs`, format: 'esm' },
    { dir: `${dest}/cjs`, format: 'cjs', entryFileNames: '[name].cjs' },
  ],
});

export const buildTypes = (dest: string): RollupOptions => ({
  input: 'src/index.ts',
  output: [{ file: `${dest}/index.d.ts`, format: 'esm' }],
  external: (id) => isExternal(id),
  plugins: [dtsPlugin()],
});

const config: RollupOptions[] = [
  buildLibrary(outputPath),
  buildTypes(outputPath),
];

export default config;
