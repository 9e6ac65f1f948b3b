import { access, mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { InventoryItem } from '@brewsheet/shared';
import { inventoryItemSchema, sanitizeFileName } from '@brewsheet/shared';
import type { NameLookup } from '../recipe/recipe-index';

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Inventory items stored one JSON file each under `<CATALOG_DIR>/<category>/`.
 * Items are looked up by their exact name across every category.
 */
@Injectable()
export class ItemCatalogService implements NameLookup<InventoryItem> {
  private readonly logger = new Logger(ItemCatalogService.name);
  private readonly items = new Map<string, InventoryItem>();
  private readonly dirty = new Set<InventoryItem>();

  constructor(private readonly config: ConfigService) {}

  get rootDir(): string {
    return this.config.getOrThrow<string>('CATALOG_DIR');
  }

  get size(): number {
    return this.items.size;
  }

  get all(): InventoryItem[] {
    return [...this.items.values()];
  }

  /** Read every item file; returns the number of items known afterwards */
  async load(): Promise<number> {
    this.items.clear();
    this.dirty.clear();
    if (!(await exists(this.rootDir))) {
      this.logger.log(`Catalog folder ${this.rootDir} does not exist yet; starting empty`);
      return 0;
    }

    const folders = await readdir(this.rootDir, { withFileTypes: true });
    for (const folder of folders) {
      if (!folder.isDirectory()) continue;
      const files = await readdir(join(this.rootDir, folder.name));
      for (const file of files.filter((f) => extname(f).toLowerCase() === '.json').sort()) {
        this.register(await this.readItem(join(this.rootDir, folder.name, file)));
      }
    }

    this.logger.log(`Loaded ${this.items.size} items from ${this.rootDir}`);
    return this.items.size;
  }

  resolve(name: string): InventoryItem | undefined {
    return this.items.get(name);
  }

  /** Existing item by name, or a new default item in `category`. Either way it is marked dirty. */
  async findOrCreate(name: string, category: string): Promise<InventoryItem> {
    const existing = this.items.get(name);
    if (existing) {
      this.markDirty(existing);
      return existing;
    }

    const folder = join(this.rootDir, sanitizeFileName(category));
    if (!(await exists(folder))) {
      this.logger.warn(`Folder path '${folder}' does not exist - creating it now.`);
      await mkdir(folder, { recursive: true });
    }

    const item: InventoryItem = inventoryItemSchema.parse({ name, category });
    this.register(item);
    this.markDirty(item);
    this.logger.log(`Created ${category} item '${name}'`);
    return item;
  }

  markDirty(item: InventoryItem): void {
    this.dirty.add(item);
  }

  /** Write every dirty item; returns how many were written */
  async save(): Promise<number> {
    let written = 0;
    for (const item of this.dirty) {
      const folder = join(this.rootDir, sanitizeFileName(item.category));
      await mkdir(folder, { recursive: true });
      await writeFile(this.itemPath(item), `${JSON.stringify(item, null, 2)}\n`, 'utf-8');
      written++;
    }
    this.dirty.clear();
    this.logger.log(`Saved ${written} items to ${this.rootDir}`);
    return written;
  }

  itemPath(item: InventoryItem): string {
    return join(this.rootDir, sanitizeFileName(item.category), `${sanitizeFileName(item.name)}.json`);
  }

  private register(item: InventoryItem): void {
    if (this.items.has(item.name)) {
      this.logger.warn(`Item '${item.name}' exists in more than one folder; keeping the first`);
      return;
    }
    this.items.set(item.name, item);
  }

  private async readItem(path: string): Promise<InventoryItem> {
    const raw = await readFile(path, 'utf-8');
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err: unknown) {
      throw new Error(`Invalid catalog item ${path}: ${err instanceof Error ? err.message : String(err)}`);
    }

    const result = inventoryItemSchema.safeParse(parsed);
    if (!result.success) {
      const formatted = result.error.issues
        .map((i) => `  ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new Error(`Invalid catalog item ${path}:\n${formatted}`);
    }
    return result.data;
  }
}
