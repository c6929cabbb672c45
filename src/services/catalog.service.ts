import fs from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { logger } from '../utils/logger';
import { HttpStatusError, errorMessage } from '../utils/errors';

export interface CatalogItem {
  brand: string;
  model: string;
  year: string;
  color: string;
  segment: string;
  price: string;
  currency: string;
  description: string;
  location: string;
  photos: string[];
}

export interface CatalogOptions {
  csvUrl?: string;
  csvPath: string;
  refreshSeconds: number;
}

const AVAILABLE_STATUSES = new Set(['disponible', 'available', '1', 'si', 'sí', 'yes']);

// Sheet exports use either English or Spanish headers
const COLUMN_ALIASES: Record<keyof CatalogItem | 'status', string[]> = {
  brand: ['brand', 'marca'],
  model: ['model', 'modelo'],
  year: ['year', 'año', 'anio'],
  color: ['color'],
  segment: ['segment', 'segmento'],
  price: ['price', 'precio', 'precio distribuidor'],
  currency: ['currency', 'moneda'],
  description: ['description', 'descripcion_corta', 'descripcion'],
  location: ['location', 'ubicacion'],
  photos: ['photos', 'fotos', 'foto', 'imagenes'],
  status: ['status', 'estado'],
};

const rowsSchema = z.array(z.record(z.string()));

function pick(row: Record<string, string>, aliases: string[]): string {
  for (const alias of aliases) {
    const value = row[alias];
    if (value !== undefined && value.trim() !== '') return value.trim();
  }
  return '';
}

function cleanPrice(value: string): string {
  const stripped = value.replace(/[$,]/g, '').trim();
  return stripped || value;
}

export function normalizeText(value: string): string {
  return value
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .trim();
}

/** Parses a catalog export, keeping only rows whose status (when present) means available. */
export function parseCatalogCsv(content: string): CatalogItem[] {
  const rows = rowsSchema.parse(
    parse(content, {
      columns: (header: string[]) => header.map((h) => h.trim().toLowerCase()),
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    })
  );

  const items: CatalogItem[] = [];
  for (const row of rows) {
    const status = pick(row, COLUMN_ALIASES.status).toLowerCase();
    if (status && !AVAILABLE_STATUSES.has(status)) continue;

    const model = pick(row, COLUMN_ALIASES.model);
    if (!model) continue;

    items.push({
      brand: pick(row, COLUMN_ALIASES.brand),
      model,
      year: pick(row, COLUMN_ALIASES.year),
      color: pick(row, COLUMN_ALIASES.color),
      segment: pick(row, COLUMN_ALIASES.segment),
      price: cleanPrice(pick(row, COLUMN_ALIASES.price)),
      currency: pick(row, COLUMN_ALIASES.currency),
      description: pick(row, COLUMN_ALIASES.description),
      location: pick(row, COLUMN_ALIASES.location),
      photos: pick(row, COLUMN_ALIASES.photos)
        .split('|')
        .map((url) => url.trim())
        .filter((url) => url.startsWith('http')),
    });
  }
  return items;
}

/**
 * Holds the current catalog snapshot and refreshes it on a fixed interval.
 * A failed refresh keeps serving the previous snapshot.
 */
export class CatalogService {
  private items: CatalogItem[] = [];
  private timer: NodeJS.Timeout | null = null;
  private loadedAt: Date | null = null;

  constructor(private readonly options: CatalogOptions) {}

  currentCatalog(): readonly CatalogItem[] {
    return this.items;
  }

  get lastLoadedAt(): Date | null {
    return this.loadedAt;
  }

  /** Best match for a model name the customer or the reply generator used. */
  findByModel(name: string): CatalogItem | undefined {
    const wanted = normalizeText(name);
    if (!wanted) return undefined;

    const exact = this.items.find((item) => normalizeText(item.model) === wanted);
    if (exact) return exact;

    return this.items.find((item) => {
      const model = normalizeText(item.model);
      const full = normalizeText(`${item.brand} ${item.model} ${item.year}`);
      return wanted.includes(model) || model.includes(wanted) || full.includes(wanted);
    });
  }

  async load(): Promise<number> {
    try {
      const content = await this.readSource();
      this.items = parseCatalogCsv(content);
      this.loadedAt = new Date();
      logger.info('Catalog loaded', { items: this.items.length, source: this.options.csvUrl ? 'url' : 'file' });
    } catch (error) {
      logger.error('Catalog load failed, keeping previous snapshot', {
        error: errorMessage(error),
        items: this.items.length,
      });
    }
    return this.items.length;
  }

  async start(): Promise<void> {
    await this.load();
    this.timer = setInterval(() => {
      this.load().catch((error: unknown) => {
        logger.error('Catalog refresh failed', { error: errorMessage(error) });
      });
    }, this.options.refreshSeconds * 1000);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async readSource(): Promise<string> {
    if (this.options.csvUrl) {
      const res = await fetch(this.options.csvUrl, { redirect: 'follow', signal: AbortSignal.timeout(20000) });
      if (!res.ok) {
        throw new HttpStatusError(res.status, await res.text());
      }
      return res.text();
    }
    return fs.readFile(this.options.csvPath, 'utf8');
  }
}
