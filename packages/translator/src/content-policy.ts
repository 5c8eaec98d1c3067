/**
 * Content policy filter
 *
 * Deterministic rewrite applied to every request before detection,
 * retrieval and generation. Rules are versioned data, loaded once at
 * startup; a malformed table is a PolicyError then, never at request time.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { pino } from 'pino';
import { PolicyError, errorMessage } from '@rioplatense/core';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

const PolicyTableSchema = z.object({
  version: z.string().min(1),
  rules: z.array(z.object({
    id: z.string().min(1),
    description: z.string().optional(),
    patterns: z.array(z.string().min(1)).min(1),
    replacement: z.string(),
  })).min(1),
});

export type PolicyTable = z.infer<typeof PolicyTableSchema>;

interface CompiledRule {
  id: string;
  patterns: RegExp[];
  replacement: string;
}

export const DEFAULT_POLICY_PATH = new URL('../policy/sovereignty.json', import.meta.url);

/**
 * Read and validate a policy table from disk
 *
 * @throws PolicyError
 */
export function loadPolicyTable(path: string | URL = DEFAULT_POLICY_PATH): PolicyTable {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new PolicyError(`Could not read policy table ${String(path)}: ${errorMessage(error)}`, { cause: error });
  }
  return parsePolicyTable(raw);
}

export function parsePolicyTable(raw: unknown): PolicyTable {
  const parsed = PolicyTableSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new PolicyError(`Invalid policy table: ${problems.join('; ')}`);
  }
  return parsed.data;
}

function compileRule(rule: PolicyTable['rules'][number]): CompiledRule {
  return {
    id: rule.id,
    replacement: rule.replacement,
    patterns: rule.patterns.map(source => {
      try {
        return new RegExp(source, 'giu');
      } catch (error) {
        throw new PolicyError(`Rule ${rule.id} has an invalid pattern: ${source}`, { cause: error });
      }
    }),
  };
}

export class ContentPolicyFilter {
  readonly version: string;
  private readonly rules: readonly CompiledRule[];

  /**
   * @throws PolicyError if any pattern does not compile
   */
  constructor(table: PolicyTable) {
    this.version = table.version;
    this.rules = table.rules.map(compileRule);
  }

  static fromFile(path?: string | URL): ContentPolicyFilter {
    return new ContentPolicyFilter(loadPolicyTable(path));
  }

  /**
   * Rewrite every policy match to its canonical replacement
   */
  apply(text: string): string {
    let result = text;
    for (const rule of this.rules) {
      for (const pattern of rule.patterns) {
        // Function form keeps "$" in replacements literal
        const rewritten = result.replace(pattern, () => rule.replacement);
        if (rewritten !== result) {
          logger.info({ event: 'policy.rewrite', rule: rule.id, version: this.version }, 'Content policy applied');
          result = rewritten;
        }
      }
    }
    return result;
  }
}
