import { z } from 'zod';
import {
  LANGUAGE_IDS,
  DEFAULT_LAYOUT,
  type LanguageId,
  type LexErrorPolicy,
  type TruncationPolicy,
} from '@callflow/parser';

/**
 * Shape of .callflow.yml. Every key is optional; omitted keys take defaults.
 */
export const configFileSchema = z
  .object({
    language: z.enum(LANGUAGE_IDS).default('go'),
    onLexError: z.enum(['skip-file', 'abort-run']).default('skip-file'),
    truncation: z.enum(['lenient', 'strict']).default('lenient'),
    extensions: z
      .array(z.string().regex(/^\.[A-Za-z0-9]+$/, 'extensions must look like ".go"'))
      .min(1)
      .optional(),
    layout: z
      .string()
      .regex(/^[a-z]+$/, 'layout must be a Graphviz engine name such as "dot" or "sfdp"')
      .default(DEFAULT_LAYOUT),
  })
  .strict();

/**
 * Fully resolved configuration
 */
export interface CallflowConfig {
  language: LanguageId;
  onLexError: LexErrorPolicy;
  truncation: TruncationPolicy;
  /** Accepted source extensions for --paths, dot included */
  extensions: string[];
  /** Graphviz layout engine named in the document hint comment */
  layout: string;
}
