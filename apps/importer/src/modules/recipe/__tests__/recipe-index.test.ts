import { describe, it, expect } from 'vitest';
import type { EntityRef } from '@brewsheet/shared';
import { DiagnosticLog } from '../../../common/diagnostics/diagnostic-log';
import type { NameLookup } from '../recipe-index';
import { RecipeIndex } from '../recipe-index';

const NAMES = ['Herb', 'Water', 'Salt', 'Ash', 'water', 'Potion A', 'Potion B'];

function catalog(): NameLookup<EntityRef> & { item(name: string): EntityRef } {
  const items = new Map(NAMES.map((name): [string, EntityRef] => [name, { name }]));
  return {
    resolve: (name) => items.get(name),
    item: (name) => {
      const found = items.get(name);
      if (!found) throw new Error(`no test item ${name}`);
      return found;
    },
  };
}

function setup() {
  const log = new DiagnosticLog('RecipeIndexTest');
  return { log, names: catalog(), index: new RecipeIndex<EntityRef>(log) };
}

describe('RecipeIndex.tryAdd', () => {
  it('stores ingredients sorted by name', () => {
    const { index, names } = setup();
    expect(index.tryAdd(names, 'Potion A', ['Water', 'Herb', null])).toBe(true);
    expect(index.state).toBe('populated');
    expect(index.toStored()).toEqual([{ ingredients: ['Herb', 'Water'], product: 'Potion A' }]);
  });

  it('sorts in ordinal order', () => {
    const { index, names } = setup();
    index.tryAdd(names, 'Potion A', ['water', 'Herb']);
    expect(index.toStored()[0]?.ingredients).toEqual(['Herb', 'water']);
  });

  it('collides on the same ingredients in another order and keeps the first product', () => {
    const { index, names, log } = setup();
    expect(index.tryAdd(names, 'Potion A', ['Herb', 'Water'])).toBe(true);
    expect(index.tryAdd(names, 'Potion B', ['Water', 'Herb'])).toBe(true);

    expect(index.count).toBe(1);
    expect(index.findProduct([names.item('Water'), names.item('Herb')])?.name).toBe('Potion A');
    expect(log.count('DUPLICATE_KEY')).toBe(1);
    expect(log.diagnostics[0]?.message).toBe(
      "Duplicate recipe detected: 'Herb' + 'Water' + '' maps to both Potion A and Potion B.\n" +
        'Only the first mapping will be kept.',
    );
  });

  it('changes nothing when no ingredient resolves', () => {
    const { index, names, log } = setup();
    index.tryAdd(names, 'Potion A', ['Herb']);
    const before = index.count;

    expect(index.tryAdd(names, 'Potion B', ['Ghost', '', '  ', undefined])).toBe(false);
    expect(index.count).toBe(before);
    expect(log.count()).toBe(0);
  });

  it('stays empty after a rejected first add', () => {
    const { index, names } = setup();
    expect(index.tryAdd(names, 'Potion A', [])).toBe(false);
    expect(index.state).toBe('empty');
  });

  it('drops unknown ingredients but needs a known product', () => {
    const { index, names } = setup();
    expect(index.tryAdd(names, 'Potion A', ['Herb', 'Ghost'])).toBe(true);
    expect(index.toStored()).toEqual([{ ingredients: ['Herb'], product: 'Potion A' }]);

    expect(index.tryAdd(names, 'Mystery', ['Salt'])).toBe(false);
    expect(index.count).toBe(1);
  });

  it('rejects more ingredients than a key holds', () => {
    const { index, names, log } = setup();
    expect(index.tryAdd(names, 'Potion A', ['Herb', 'Water', 'Salt', 'Ash'])).toBe(false);
    expect(index.count).toBe(0);
    expect(log.count('UNSUPPORTED')).toBe(1);
  });
});

describe('RecipeIndex lookups and lifecycle', () => {
  it('finds products for any ordering of up to three ingredients', () => {
    const { index, names } = setup();
    index.tryAdd(names, 'Potion B', ['Salt', 'Ash', 'Herb']);
    const [herb, salt, ash] = [names.item('Herb'), names.item('Salt'), names.item('Ash')];

    expect(index.findProduct([herb, salt, ash])?.name).toBe('Potion B');
    expect(index.findProduct([salt, herb])).toBeUndefined();
    expect(index.findProduct([])).toBeUndefined();
  });

  it('clears back to empty', () => {
    const { index, names } = setup();
    index.tryAdd(names, 'Potion A', ['Herb']);
    index.clear();

    expect(index.state).toBe('empty');
    expect(index.count).toBe(0);
    expect(index.findProduct([names.item('Herb')])).toBeUndefined();
  });

  it('rehydrates records, keeping the first of colliding ones', () => {
    const { index, names, log } = setup();
    const herb = names.item('Herb');
    const water = names.item('Water');

    index.rehydrate([
      { ingredients: [water, herb], product: names.item('Potion A') },
      { ingredients: [herb, water], product: names.item('Potion B') },
      { ingredients: [names.item('Salt')], product: names.item('Potion B') },
    ]);

    expect(index.count).toBe(2);
    expect(index.state).toBe('populated');
    expect(index.records[0]?.ingredients.map((item) => item.name)).toEqual(['Herb', 'Water']);
    expect(index.findProduct([herb, water])?.name).toBe('Potion A');
    expect(log.count('DUPLICATE_KEY')).toBe(1);
  });
});
