import { z } from 'zod';

/**
 * Configuration Schema using Zod for runtime validation
 * Ensures type safety and validation of all configuration values
 */

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export const LogFormatSchema = z.enum(['json', 'simple', 'pretty']);
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export const TransportSchema = z.enum(['stdio']);

export const ServerConfigSchema = z.object({
  nodeEnv: NodeEnvSchema.default('development'),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  format: LogFormatSchema.default('json'),
  dir: z.string().default('./logs'),
  maxFiles: z.number().int().min(1).default(10),
  maxSize: z.string().default('10m'),
  toFile: z.boolean().default(true),
  silent: z.boolean().default(false),
});

export const MCPConfigSchema = z.object({
  serverName: z.string().default('docmirror-mcp'),
  serverVersion: z.string().default('0.1.0'),
  transport: TransportSchema.default('stdio'),
});

export const CacheConfigSchema = z.object({
  cacheDir: z.string().min(1),
  baseUrl: z.string().url(),
  hostSegment: z.string().min(1),
  pathPrefix: z.string().startsWith('/'),
  skipDownload: z.boolean().default(false),
  minFileCount: z.number().int().min(0).default(500),
  minFreeDiskMb: z.number().min(0).default(100),
});

export const CrawlerConfigSchema = z.object({
  maxRetries: z.number().int().min(1).default(3),
  requestTimeout: z.number().int().min(1).default(30000),
  userAgent: z.string().default('docmirror-mcp/0.1.0'),
});

export const IndexConfigSchema = z.object({
  enableFullText: z.boolean().default(true),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  server: ServerConfigSchema,
  logging: LoggingConfigSchema,
  mcp: MCPConfigSchema,
  cache: CacheConfigSchema,
  crawler: CrawlerConfigSchema,
  index: IndexConfigSchema,
});

/**
 * TypeScript type derived from schema
 */
export type Config = z.infer<typeof ConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogFormat = z.infer<typeof LogFormatSchema>;
export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type Transport = z.infer<typeof TransportSchema>;
export type CacheConfig = z.infer<typeof CacheConfigSchema>;
export type CrawlerConfig = z.infer<typeof CrawlerConfigSchema>;
