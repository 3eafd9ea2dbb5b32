import { z } from 'zod';

export const databaseConfigSchema = z.object({
  path: z.string().min(1).default('sqldesk.db'),
  sample_rows: z.number().int().positive().default(3),
});

export const serverConfigSchema = z.object({
  host: z.string().default('127.0.0.1'),
  port: z.number().int().min(1).max(65535).default(3000),
  /** bcrypt hash of the API key; when unset the HTTP API is open. */
  api_key_hash: z.string().optional(),
});

export const sqlDeskConfigSchema = z.object({
  database: databaseConfigSchema.default({}),
  server: serverConfigSchema.default({}),
});

export type SqlDeskConfigParsed = z.infer<typeof sqlDeskConfigSchema>;
