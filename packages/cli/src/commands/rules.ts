import { Command } from 'commander';
import path from 'path';
import { ConfigLoader } from '@leakscan/core';
import { RegexRule, buildRuleSet, type ScanRule } from '@leakscan/scanner';
import { OutputRenderer, type RuleInfo } from '../output';
import type { GlobalOptions } from '../program';

export function describeRule(rule: ScanRule): RuleInfo {
  return {
    id: rule.id,
    pattern:
      rule instanceof RegexRule ? `/${rule.pattern.source}/${rule.pattern.flags}` : undefined,
    description: rule.description,
  };
}

export function registerRulesCommand(program: Command) {
  program
    .command('rules')
    .description('List the scan rules in effect')
    .option('--dir <dir>', 'Directory whose .leakscan.yaml applies', '.')
    .action((options: { dir: string }) => {
      const globalOpts = program.opts<GlobalOptions>();
      const config = ConfigLoader.load({
        configPath: globalOpts.config,
        cwd: path.resolve(options.dir),
      });
      const rules = buildRuleSet(config.rules);
      new OutputRenderer(!!globalOpts.json).renderRules(rules.map(describeRule));
    });
}
