// Config schemas
export {
  PortNumberSchema,
  PortListEntrySchema,
  PortListsDocumentSchema,
  ScanTargetSchema,
  type PortListEntry,
  type PortListsDocument,
  type ScanTargetInput,
} from './config.js';

// CLI schemas
export { CliOptionsSchema, type CliOptions } from './cli.js';
