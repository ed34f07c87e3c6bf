/**
 * MFA Configuration Schema
 *
 * One optional block per code source. A source without configuration is
 * skipped by the resolver and never suggested to the operator.
 */

import { z } from 'zod';

export const ImapConfigSchema = z.object({
  host: z.string().min(1).default('imap.gmail.com'),
  port: z.number().int().min(1).max(65535).default(993),
  user: z.string().min(1),
  password: z.string().min(1).describe('Application password'),
  secure: z.boolean().default(true),
});

export const MailboxConfigSchema = z.object({
  senderDomain: z.string().min(1).default('garmin.com'),
  initialDelayMs: z.number().int().min(0).max(120_000).default(15_000),
  searchWindowsMinutes: z
    .array(z.number().int().min(1).max(1440))
    .min(1)
    .default([5, 10])
    .describe('Search windows, narrowest first'),
  gmailTokenFile: z.string().min(1).optional().describe('Stored refreshable OAuth token'),
  imap: ImapConfigSchema.optional(),
});

export const MfaConfigSchema = z.object({
  code: z.string().min(1).optional().describe('Pre-shared MFA code'),
  filePath: z.string().min(1).optional().describe('Transient file an operator drops a code into'),
  webhookUrl: z.string().url().optional().describe('Endpoint returning the current code'),
  webhookTimeoutMs: z.number().int().min(100).max(60_000).default(10_000),
  strategyTimeoutMs: z.number().int().min(100).max(120_000).default(10_000),
  mailbox: MailboxConfigSchema.optional(),
});

export type ImapConfig = z.infer<typeof ImapConfigSchema>;
export type MailboxConfig = z.infer<typeof MailboxConfigSchema>;
export type MfaConfig = z.infer<typeof MfaConfigSchema>;
export type MfaConfigInput = z.input<typeof MfaConfigSchema>;
