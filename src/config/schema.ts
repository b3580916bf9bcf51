import { z } from 'zod';

export const WebClientKindSchema = z.enum(['axios', 'undici']);

export const OutputFormatSchema = z.enum(['tabtree', 'pages', 'json']);

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const ConfigSchema = z
  .object({
    client: WebClientKindSchema.default('axios'),
    timeout: z.number().positive('Timeout must be a positive number of seconds').default(60),
    wait: z.number().min(0, 'Wait cannot be negative').default(0),
    randomWait: z.boolean().default(false),
    proxy: z
      .string()
      .url('Proxy must be a URL')
      .refine((value) => /^https?:\/\//i.test(value), 'Proxy must be a HTTP(s) URL')
      .optional(),
    concurrency: z.number().int().min(1, 'Concurrency must be at least 1').default(1),
    useRobots: z.boolean().default(true),
    useKnownPaths: z.boolean().default(true),
    extraKnownPaths: z.array(z.string().min(1, 'Known path cannot be empty')).default([]),
    exclude: z.array(z.string().min(1, 'Exclude pattern cannot be empty')).default([]),
    stripUrl: z.boolean().default(false),
    format: OutputFormatSchema.default('tabtree'),
    output: z.string().min(1).optional(),
    logLevel: LogLevelSchema.default('warn'),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
/** Unvalidated values for any configuration key, as they come from the command line. */
export type ConfigOverrides = { [K in keyof ConfigInput]?: unknown };

export type OutputFormat = z.infer<typeof OutputFormatSchema>;
