import { describe, it, expect } from 'vitest';
import { readFileSync, readdirSync } from 'node:fs';
import * as path from 'path';
import { fileURLToPath } from 'node:url';

const dataDir = fileURLToPath(new URL('..', import.meta.url));
const rootDir = fileURLToPath(new URL('../../../../../', import.meta.url));

describe('同梱データ', () => {
  it('text/とpersona/から見た../data/に置かれている', () => {
    const files = readdirSync(dataDir).filter((name) => name.endsWith('.json')).sort();
    expect(files).toEqual(['lexicon.json', 'stopwords.json']);
    for (const name of files) {
      expect(fileURLToPath(new URL(`../../text/../data/${name}`, import.meta.url))).toBe(path.join(dataDir, name));
    }
  });

  it('buildはdataディレクトリをビルド出力にコピーする', () => {
    const packageJson = JSON.parse(readFileSync(path.join(rootDir, 'package.json'), 'utf-8')) as {
      scripts: Record<string, string>;
    };
    const tsconfig = JSON.parse(readFileSync(path.join(rootDir, 'tsconfig.json'), 'utf-8')) as {
      compilerOptions: { rootDir: string; outDir: string };
    };

    const { rootDir: sourceRoot, outDir } = tsconfig.compilerOptions;
    const relativeData = path.relative(path.join(rootDir, sourceRoot), dataDir);
    const target = path.join(outDir, path.dirname(relativeData));

    expect(packageJson.scripts.build).toBe(`tsc -p tsconfig.json && cp -R ${relativeData} ${target}/`);
  });
});
