import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ConfigService } from '@nestjs/config';
import type { EntityRef } from '@brewsheet/shared';
import { DiagnosticLog } from '../../../common/diagnostics/diagnostic-log';
import type { NameLookup } from '../recipe-index';
import { RecipeRepository } from '../recipe.repository';

const items = new Map(
  ['Herb', 'Water', 'Salt', 'Potion A', 'Potion B'].map((name): [string, EntityRef] => [name, { name }]),
);
const names: NameLookup<EntityRef> = { resolve: (name) => items.get(name) };

describe('RecipeRepository', () => {
  let dir: string;
  let repo: RecipeRepository;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'brewsheet-recipes-'));
    repo = new RecipeRepository(new ConfigService({ CATALOG_DIR: dir, RECIPES_FILE: 'recipes.json' }));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('starts empty when no file exists', async () => {
    const index = await repo.load(names, new DiagnosticLog('RecipeRepositoryTest'));
    expect(index.state).toBe('empty');
  });

  it('saves records in order and loads them back', async () => {
    const log = new DiagnosticLog('RecipeRepositoryTest');
    const index = await repo.load(names, log);
    index.tryAdd(names, 'Potion B', ['Water', 'Salt']);
    index.tryAdd(names, 'Potion A', ['Herb']);
    await repo.save(index);

    const saved: unknown = JSON.parse(await readFile(join(dir, 'recipes.json'), 'utf-8'));
    expect(saved).toEqual({
      recipes: [
        { ingredients: ['Salt', 'Water'], product: 'Potion B' },
        { ingredients: ['Herb'], product: 'Potion A' },
      ],
    });

    const reloaded = await repo.load(names, log);
    expect(reloaded.toStored()).toEqual(index.toStored());
    expect(reloaded.findProduct([{ name: 'Water' }, { name: 'Salt' }])?.name).toBe('Potion B');
    expect(log.count()).toBe(0);
  });

  it('drops stored recipes whose items no longer exist', async () => {
    await writeFile(
      join(dir, 'recipes.json'),
      JSON.stringify({
        recipes: [
          { ingredients: ['Herb', 'Moonpetal'], product: 'Potion A' },
          { ingredients: ['Salt'], product: 'Potion B' },
        ],
      }),
    );
    const log = new DiagnosticLog('RecipeRepositoryTest');
    const index = await repo.load(names, log);

    expect(index.toStored()).toEqual([{ ingredients: ['Salt'], product: 'Potion B' }]);
    expect(log.count('NOT_FOUND')).toBe(1);
    expect(log.diagnostics[0]?.message).toBe(
      "Dropping stored recipe for 'Potion A': unknown item(s) 'Moonpetal'",
    );
  });

  it('rejects a malformed file', async () => {
    await writeFile(join(dir, 'recipes.json'), JSON.stringify({ recipes: [{ ingredients: [], product: 'X' }] }));
    await expect(repo.load(names, new DiagnosticLog('RecipeRepositoryTest'))).rejects.toThrow(
      /Invalid recipe file/,
    );
  });

  it('names the file when it is not valid JSON', async () => {
    await writeFile(join(dir, 'recipes.json'), '{ "recipes": [');
    await expect(repo.load(names, new DiagnosticLog('RecipeRepositoryTest'))).rejects.toThrow(
      `Invalid recipe file ${join(dir, 'recipes.json')}: `,
    );
  });
});
