import { z } from 'zod';

/** Free-form key/value pairs attached to an object. Keys are never case-converted. */
export const metadataSchema = z.record(z.string());

export type Metadata = z.output<typeof metadataSchema>;
