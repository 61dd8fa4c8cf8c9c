import { z } from "zod";

/** Accepts JSON numbers and numeric strings, as sent by the bin firmware */
const numeric = z
  .union([z.number(), z.string().trim().min(1).transform(Number)])
  .pipe(z.number().finite());

/**
 * Ingestion payload. Field names are the ones the devices already send.
 */
export const createReadingDto = z.object({
  peso_kg: numeric.pipe(z.number().min(0)),
  sensor_id: z.string().trim().min(1).max(100),
  temperatura: numeric.optional(),
  umidade: numeric.optional(),
  localizacao: z.string().trim().min(1).max(200).optional(),
  timestamp: z.string().datetime({ offset: true }).optional(),
});

export const listReadingsQuery = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  sensor_id: z.string().trim().min(1).optional(),
});

export const readingStatsQuery = z.object({
  sensor_id: z.string().trim().min(1).optional(),
  days: z.coerce.number().int().min(1).max(3650).optional(),
});

export type CreateReadingDto = z.infer<typeof createReadingDto>;
export type ListReadingsQuery = z.infer<typeof listReadingsQuery>;
export type ReadingStatsQuery = z.infer<typeof readingStatsQuery>;
