import { z } from 'zod';

export const PortNumberSchema = z.number().int().min(1).max(65535);

// One [port_lists.<name>] table of the port list document
export const PortListEntrySchema = z.object({
  description: z.string().default('No description'),
  // Labels are checked per entry by the loader so one bad value drops only its port
  ports: z.record(z.string(), z.unknown()).default({}),
});

export const PortListsDocumentSchema = z.object({
  port_lists: z.record(z.string(), PortListEntrySchema),
});

export const ScanTargetSchema = z.object({
  host: z.string().trim().min(1, 'Host must not be empty'),
  ports: z
    .array(PortNumberSchema)
    .min(1, 'No ports to scan')
    .transform((ports) => [...new Set(ports)]),
  timeoutMs: z.number().positive('Timeout must be greater than zero'),
  concurrency: z.number().int().min(1, 'Concurrency must be at least 1').default(50),
});

export type PortListEntry = z.infer<typeof PortListEntrySchema>;
export type PortListsDocument = z.infer<typeof PortListsDocumentSchema>;
export type ScanTargetInput = z.input<typeof ScanTargetSchema>;
