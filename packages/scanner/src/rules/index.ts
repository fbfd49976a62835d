import { ConfigError, type RulesConfig } from '@leakscan/shared';
import type { ScanRule } from '../types';

export interface RegexRuleOptions {
  flags?: string;
  description?: string;
}

/**
 * A scan rule backed by a regular expression. The whole matched text is the
 * reported secret. `g` and `y` are dropped so the expression keeps no state
 * between calls.
 */
export class RegexRule implements ScanRule {
  readonly id: string;
  readonly description?: string;
  readonly pattern: RegExp;

  constructor(id: string, pattern: string | RegExp, options: RegexRuleOptions = {}) {
    const source = typeof pattern === 'string' ? pattern : pattern.source;
    const flags = options.flags ?? (typeof pattern === 'string' ? '' : pattern.flags);
    this.id = id;
    this.description = options.description;
    this.pattern = new RegExp(source, flags.replace(/[gy]/g, ''));
  }

  match(line: string): string | undefined {
    const found = this.pattern.exec(line);
    // An empty match carries no secret.
    if (!found || found[0].length === 0) return undefined;
    return found[0];
  }
}

export const DEFAULT_RULES: readonly ScanRule[] = Object.freeze([
  new RegexRule('credential-assignment', /(AWS|API|SECRET|TOKEN|PASSWORD|KEY)[\s=:"]+([A-Za-z0-9-_]+)/i, {
    description: 'Assignment to an API, AWS, secret, token, password or key variable',
  }),
  new RegexRule('password-assignment', /(passwd|password|pass)[\s=:"]+([A-Za-z0-9-_]+)/i, {
    description: 'Assignment to a passwd, password or pass variable',
  }),
  new RegexRule('github-token', /ghp_[A-Za-z0-9]{36}/, {
    description: 'GitHub personal access token',
  }),
  new RegexRule('jwt', /eyJ[a-zA-Z0-9]{20,}\.[a-zA-Z0-9_-]+/, {
    description: 'JSON Web Token',
  }),
  new RegexRule('ssh-rsa-key', /ssh-rsa [A-Za-z0-9+/=]+/, {
    description: 'SSH RSA public key',
  }),
  new RegexRule(
    'database-credential',
    /(db_pass|db_password|db_user|access_key|secret_key)[\s=:"]+([A-Za-z0-9-_]+)/i,
    { description: 'Database user, password or access key assignment' },
  ),
]);

/**
 * Builds the rule set for a run from configuration. Rule ids must be unique.
 */
export function buildRuleSet(config: RulesConfig): readonly ScanRule[] {
  const rules: ScanRule[] = config.useDefaults ? [...DEFAULT_RULES] : [];
  for (const custom of config.custom) {
    rules.push(
      new RegexRule(custom.id, custom.pattern, {
        flags: custom.flags,
        description: custom.description,
      }),
    );
  }

  const seen = new Set<string>();
  for (const rule of rules) {
    if (seen.has(rule.id)) {
      throw new ConfigError(`Duplicate rule id: ${rule.id}`, { details: { id: rule.id } });
    }
    seen.add(rule.id);
  }

  return Object.freeze(rules);
}
