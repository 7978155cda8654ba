// Limites et valeurs par défaut du catalogue.
// Les valeurs peuvent être partiellement surchargées via server/catalog.config.json.
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { logger } from '../logger.js';
import type { Category } from '../domain/types.js';

export type CatalogConfig = Partial<{
  // Tri appliqué quand le client n'en précise pas
  DEFAULT_SORT: string;
  PRODUCT_NAME_MAX_LENGTH: number;
  OPTION_NAME_MAX_LENGTH: number;
  // Borne exclusive de la quantité d'une option
  OPTION_QUANTITY_MAX: number;
  // Termes interdits dans un nom de produit (comparaison insensible à la casse)
  RESERVED_NAME_TERMS: string[];
  // Fichier des catégories chargées au démarrage, relatif au fichier de config
  CATEGORIES_FILE: string;
}>;

const defaultConfig: Required<CatalogConfig> = {
  DEFAULT_SORT: 'id,asc',
  PRODUCT_NAME_MAX_LENGTH: 15,
  OPTION_NAME_MAX_LENGTH: 50,
  OPTION_QUANTITY_MAX: 100_000_000,
  RESERVED_NAME_TERMS: [],
  CATEGORIES_FILE: 'categories.json',
};

const CatalogConfigSchema = z.object({
  DEFAULT_SORT: z.string(),
  PRODUCT_NAME_MAX_LENGTH: z.number().int().positive(),
  OPTION_NAME_MAX_LENGTH: z.number().int().positive(),
  OPTION_QUANTITY_MAX: z.number().int().positive(),
  RESERVED_NAME_TERMS: z.array(z.string()),
  CATEGORIES_FILE: z.string(),
}).partial();

const CategoriesFileSchema = z.array(z.object({
  id: z.number().int().positive(),
  name: z.string().min(1),
  color: z.string(),
  imageUrl: z.string(),
  description: z.string().default(''),
}));

const CONFIG_CANDIDATES = [
  path.resolve(process.cwd(), 'catalog.config.json'),
  path.resolve(process.cwd(), 'server', 'catalog.config.json'),
];

export type LoadedConfig = {
  config: Required<CatalogConfig>;
  path: string | null;
};

/**
 * Read the first config file that exists. Returns `null` when that file is
 * not valid JSON or has a wrongly typed key (the error is logged); no file at
 * all means defaults.
 */
export const readConfig = (candidates: string[] = CONFIG_CANDIDATES): LoadedConfig | null => {
  for (const candidate of candidates) {
    if (!fs.existsSync(candidate)) continue;
    try {
      const raw = fs.readFileSync(candidate, 'utf8');
      const json: CatalogConfig = CatalogConfigSchema.parse(JSON.parse(raw));
      return { config: { ...defaultConfig, ...json }, path: candidate };
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      logger.error({ event: 'catalog.config.parse_error', path: candidate, error });
      return null;
    }
  }
  return { config: { ...defaultConfig }, path: null };
};

const initialLoad = readConfig() ?? { config: { ...defaultConfig }, path: null };

export const CONFIG: Required<CatalogConfig> = { ...initialLoad.config };

/**
 * Load the seed categories. The file is looked up beside the config file
 * that was loaded, or under `cwd/server` and `cwd` when defaults are in use.
 */
export function loadCategories(loaded: LoadedConfig = initialLoad): Category[] {
  const dirs = loaded.path
    ? [path.dirname(loaded.path)]
    : [path.resolve(process.cwd(), 'server'), process.cwd()];
  for (const dir of dirs) {
    const file = path.resolve(dir, loaded.config.CATEGORIES_FILE);
    if (!fs.existsSync(file)) continue;
    try {
      const categories: Category[] = CategoriesFileSchema.parse(JSON.parse(fs.readFileSync(file, 'utf8')));
      logger.info({ event: 'catalog.categories.loaded', path: file, count: categories.length });
      return categories;
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      logger.error({ event: 'catalog.categories.parse_error', path: file, error });
      return [];
    }
  }
  logger.warn({ event: 'catalog.categories.missing', file: loaded.config.CATEGORIES_FILE });
  return [];
}
