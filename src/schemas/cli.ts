import { z } from 'zod';
import { PortNumberSchema } from './config.js';

const numeric = (label: string) =>
  z.string().trim().regex(/^\d+(\.\d+)?$/, `${label} must be a number`).transform(Number);

export const CliOptionsSchema = z.object({
  host: z.string().trim().min(1).default('localhost'),
  port: numeric('Port').pipe(PortNumberSchema).optional(),
  range: z.tuple([numeric('Range start'), numeric('Range end')]).optional(),
  list: z.string().optional(),
  showLists: z.boolean().default(false),
  showClosed: z.boolean().default(false),
  noServiceDetection: z.boolean().default(false),
  checkDeps: z.boolean().default(false),
  timeout: numeric('Timeout').pipe(z.number().positive('Timeout must be greater than zero')).default('3'),
  threads: numeric('Threads').pipe(z.number().int().min(1, 'Threads must be at least 1')).default('50'),
  fast: z.boolean().default(false),
  verbose: z.boolean().default(false),
  version: z.boolean().default(false),
  help: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;
