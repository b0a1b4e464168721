/**
 * Routing Rules
 *
 * Lists and maps that steer intake and classification, loaded from a JSON
 * file (RULES_PATH, default config/rules.json) and validated with zod.
 *
 * - whitelistedSenders: trusted senders, full addresses or "@domain" suffixes
 * - subjectKeywords: inbox subject filter (case-insensitive substring)
 * - linkKeywords: in-body URLs containing one of these are downloaded
 * - senderSuppliers: sender address -> supplier name, passed to the classifier as a hint
 * - ownerBusinessNames: our own company names, never accepted as a supplier
 *
 * A missing file means empty rules. An invalid file throws at startup.
 */

import 'dotenv/config';
import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';

export const RoutingRulesSchema = z.object({
  whitelistedSenders: z.array(z.string().trim().toLowerCase().min(1)).default([]),
  subjectKeywords: z.array(z.string().trim().min(1)).default([]),
  linkKeywords: z.array(z.string().trim().toLowerCase().min(1)).default([]),
  senderSuppliers: z
    .record(z.string())
    .default({})
    .transform((map) =>
      Object.fromEntries(Object.entries(map).map(([sender, supplier]) => [sender.trim().toLowerCase(), supplier])),
    ),
  ownerBusinessNames: z.array(z.string().trim().min(1)).default([]),
});

export type RoutingRules = z.infer<typeof RoutingRulesSchema>;

export const EMPTY_RULES: RoutingRules = {
  whitelistedSenders: [],
  subjectKeywords: [],
  linkKeywords: [],
  senderSuppliers: {},
  ownerBusinessNames: [],
};

export function parseRoutingRules(raw: unknown): RoutingRules {
  return RoutingRulesSchema.parse(raw);
}

export function loadRoutingRules(path = process.env.RULES_PATH || 'config/rules.json'): RoutingRules {
  if (!existsSync(path)) {
    console.warn('[rules] Rules file not found, using empty rules', { path });
    return EMPTY_RULES;
  }

  const result = RoutingRulesSchema.safeParse(JSON.parse(readFileSync(path, 'utf-8')));
  if (!result.success) {
    throw new Error(`Invalid routing rules in ${path}: ${result.error.message}`);
  }
  return result.data;
}

/** Whether a sender matches the allow-list (exact address or "@domain" suffix). */
export function isWhitelisted(sender: string, whitelist: readonly string[]): boolean {
  const address = sender.toLowerCase();
  return whitelist.some((entry) => (entry.startsWith('@') ? address.endsWith(entry) : address === entry));
}

export function supplierHintFor(sender: string, rules: Pick<RoutingRules, 'senderSuppliers'>): string | null {
  return rules.senderSuppliers[sender.toLowerCase()] ?? null;
}

export const routingRules: RoutingRules = loadRoutingRules();
