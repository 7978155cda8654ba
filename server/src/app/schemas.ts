import { z } from 'zod';
import { CONFIG } from './config.js';

// Schémas d'entrée pour valider les données reçues par la couche HTTP.

// Lettres, chiffres, espaces et ( ) [ ] + - & / _ uniquement.
const NAME_CHARS = /^[\p{L}\p{N} ()[\]+\-&/_]*$/u;

export const zId = z.coerce.number().int().positive();

export const zProductName = z.string()
  .trim()
  .min(1)
  .max(CONFIG.PRODUCT_NAME_MAX_LENGTH)
  .regex(NAME_CHARS, 'name_chars_illegal')
  // Lu au moment du parse pour suivre les surcharges de configuration.
  .refine(
    (name) => !CONFIG.RESERVED_NAME_TERMS.some((term) => name.toLowerCase().includes(term.toLowerCase())),
    'name_reserved_term',
  );

export const zOptionName = z.string()
  .trim()
  .min(1)
  .max(CONFIG.OPTION_NAME_MAX_LENGTH)
  .regex(NAME_CHARS, 'name_chars_illegal');

export const OptionRequestSchema = z.object({
  name: zOptionName,
  quantity: z.number().int().min(1).lt(CONFIG.OPTION_QUANTITY_MAX),
});

export const ProductUpdateSchema = z.object({
  name: zProductName,
  price: z.number().int().min(0),
  imageUrl: z.string().url(),
  categoryId: z.number().int().positive(),
});

// La liste vide passe ici: c'est l'orchestrateur qui la refuse (product_options_empty).
export const ProductAddSchema = ProductUpdateSchema.extend({
  options: z.array(OptionRequestSchema),
});

export const ProductListQuerySchema = z.object({
  sort: z.string().default(() => CONFIG.DEFAULT_SORT),
  categoryId: zId.optional(),
});

export const ProductParamsSchema = z.object({
  id: zId,
});

export const OptionParamsSchema = z.object({
  id: zId,
  optionId: zId,
});
