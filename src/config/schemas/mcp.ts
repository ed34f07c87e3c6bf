/**
 * MCP Server Configuration Schema
 */

import { z } from 'zod';

export const MCPConfigSchema = z.object({
  serverName: z.string().min(1).default('Fitness Auth MCP Server'),
  version: z
    .string()
    .regex(/^\d+\.\d+\.\d+$/, 'Version must use semver format (e.g. 1.0.0)')
    .default('1.0.0'),
  transport: z.enum(['stdio', 'httpStream']).default('stdio'),
  port: z.number().int().min(1).max(65535).default(3000),
});

export type MCPConfig = z.infer<typeof MCPConfigSchema>;
