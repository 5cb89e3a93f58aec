import { readFileSync, readdirSync, existsSync } from 'fs';
import { join, extname } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import pino, { type Logger } from 'pino';
import type { PolicySource, PolicySourceTag, RawPolicy } from '../types/index.js';

export class StaticPolicySource implements PolicySource {
  readonly name: string;
  private policies: RawPolicy[];

  constructor(name: string, texts: string[], source: PolicySourceTag = 'static') {
    this.name = name;
    this.policies = texts.map(text => ({ text, source }));
  }

  fetch(): RawPolicy[] {
    return [...this.policies];
  }
}

const policyFileSchema = z.object({
  policies: z.array(
    z.object({
      text: z.string(),
      source: z.enum(['static', 'scraped', 'news_feed']).default('static')
    })
  )
});

/**
 * Reads every *.yaml / *.yml file in a directory. Each file holds
 * `policies: [{ text, source? }]`; files that fail to parse are skipped.
 */
export class YamlPolicySource implements PolicySource {
  readonly name: string;
  private directory: string;
  private logger: Logger;

  constructor(directory: string, logger?: Logger) {
    this.name = `yaml:${directory}`;
    this.directory = directory;
    this.logger = logger ?? pino({ level: 'silent' });
  }

  fetch(): RawPolicy[] {
    if (!existsSync(this.directory)) {
      this.logger.warn({ directory: this.directory }, 'Policy directory not found');
      return [];
    }

    const files = readdirSync(this.directory)
      .filter(file => ['.yaml', '.yml'].includes(extname(file)))
      .sort();

    const policies: RawPolicy[] = [];

    for (const file of files) {
      const path = join(this.directory, file);
      try {
        const parsed = policyFileSchema.safeParse(parseYaml(readFileSync(path, 'utf-8')));
        if (!parsed.success) {
          this.logger.warn({ file: path, issues: parsed.error.issues.length }, 'Skipping malformed policy file');
          continue;
        }
        policies.push(...parsed.data.policies);
      } catch (error) {
        this.logger.warn({ file: path, err: error }, 'Skipping unreadable policy file');
      }
    }

    return policies;
  }
}
