/**
 * RuleSpecLoader — Discovers, validates and compiles *.snippet.yaml files.
 *
 * Loading fails fast: any invalid file or rule set aborts the load with a
 * SnippetConfigError naming the offending rule set.
 *
 * A rule set definition may list several `match` items; each one yields
 * its own compiled RuleSet. `{{name}}` placeholders in property IRIs are
 * filled from the match item's `vars`, so one definition can serve a
 * family of vocabularies that differ only in namespace.
 */

import { readFile, readdir, stat } from 'node:fs/promises';
import { join, relative } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { createFormatterRegistry, type FormatterRegistry } from './formatters/FormatterRegistry.js';
import { SnippetConfigError } from './RuleRegistry.js';
import type { BoundFormatter, MatchKey, PropertyRule, RuleSet } from './types.js';
import { DEFAULT_PRIORITY } from './types.js';

/** Pattern used to match snippet rule files. */
const SNIPPET_PATTERN = '.snippet.yaml';

const PLACEHOLDER = /\{\{\s*([A-Za-z_][A-Za-z0-9_-]*)\s*\}\}/g;

// ============================================================================
// Schemas
// ============================================================================

const varsSchema = z.record(z.string(), z.string());

const matchSchema = z.union([
  z.object({ type: z.string().min(1), vars: varsSchema.optional() }).strict(),
  z.object({ pattern: z.string().min(1), vars: varsSchema.optional() }).strict(),
]);

const propertyRuleSchema = z.object({
  formatter: z.string().min(1).optional(),
  options: z.record(z.string(), z.unknown()).optional(),
  multi: z.enum(['join', 'first', 'list']).optional(),
  label: z.string().min(1).optional(),
  listClass: z.string().min(1).optional(),
  itemClass: z.string().min(1).optional(),
}).strict();

const propertyList = z.array(z.string().min(1)).default([]);

export const ruleSetDefinitionSchema = z.object({
  id: z.string().min(1),
  match: z.array(matchSchema).min(1),
  priority: z.number().int().optional(),
  titleProps: propertyList,
  photoProps: propertyList,
  bodyProps: propertyList,
  descriptionProps: propertyList,
  nestedProps: propertyList,
  properties: z.record(z.string(), propertyRuleSchema).default({}),
}).strict();

export const snippetSpecSchema = z.object({
  snippetVersion: z.literal(1),
  snippets: z.array(z.unknown()),
}).strict();

/**
 * A rule set as written in a rule file (or in code).
 */
export type RuleSetDefinition = z.input<typeof ruleSetDefinitionSchema>;

type ParsedDefinition = z.output<typeof ruleSetDefinitionSchema>;
type ParsedPropertyRule = z.output<typeof propertyRuleSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

// ============================================================================
// Compilation
// ============================================================================

export interface CompileOptions {
  formatters?: FormatterRegistry;
  /** File the definition came from, for error messages */
  source?: string;
}

class DefinitionCompiler {
  constructor(
    private readonly definition: ParsedDefinition,
    private readonly formatters: FormatterRegistry,
    private readonly source: string | undefined
  ) {}

  private fail(message: string): never {
    throw new SnippetConfigError(message, this.definition.id, this.source);
  }

  private interpolate(template: string, vars: Record<string, string>): string {
    return template.replace(PLACEHOLDER, (_match, name: string) => {
      const value = vars[name];
      if (value === undefined) {
        return this.fail(`Undefined variable "{{${name}}}" in "${template}"`);
      }
      return value;
    });
  }

  private matchKey(item: ParsedDefinition['match'][number]): MatchKey {
    if ('type' in item) {
      return { kind: 'exact', type: item.type };
    }
    try {
      return { kind: 'pattern', pattern: new RegExp(item.pattern) };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return this.fail(`Invalid match pattern "${item.pattern}": ${message}`);
    }
  }

  private bindFormatter(property: string, rule: ParsedPropertyRule): BoundFormatter | undefined {
    if (rule.formatter === undefined) {
      if (rule.options !== undefined) {
        return this.fail(`Property ${property} has formatter options but no formatter`);
      }
      return undefined;
    }

    const definition = this.formatters.get(rule.formatter);
    if (!definition) {
      return this.fail(`Unknown formatter "${rule.formatter}" for property ${property}`);
    }

    try {
      return definition.bind(rule.options);
    } catch (err) {
      const message = err instanceof z.ZodError ? describeIssues(err) : err instanceof Error ? err.message : String(err);
      return this.fail(`Invalid options for formatter "${rule.formatter}" on ${property}: ${message}`);
    }
  }

  private propertyRules(vars: Record<string, string>): Map<string, PropertyRule> {
    const rules = new Map<string, PropertyRule>();
    for (const [rawProperty, rule] of Object.entries(this.definition.properties)) {
      const property = this.interpolate(rawProperty, vars);
      const formatter = this.bindFormatter(property, rule);
      rules.set(property, {
        ...(formatter !== undefined ? { formatter } : {}),
        multi: rule.multi ?? 'join',
        ...(rule.label !== undefined ? { label: rule.label } : {}),
        listClass: rule.listClass ?? 'snippet-list',
        itemClass: rule.itemClass ?? 'snippet-list-item',
      });
    }
    return rules;
  }

  compile(): RuleSet[] {
    const def = this.definition;
    return def.match.map((item) => {
      const vars = item.vars ?? {};
      const list = (props: string[]) => Object.freeze(props.map(prop => this.interpolate(prop, vars)));

      const ruleSet: RuleSet = {
        id: def.id,
        matchKey: this.matchKey(item),
        priority: def.priority ?? DEFAULT_PRIORITY,
        titleProps: list(def.titleProps),
        photoProps: list(def.photoProps),
        bodyProps: list(def.bodyProps),
        descriptionProps: list(def.descriptionProps),
        nestedProps: list(def.nestedProps),
        properties: this.propertyRules(vars),
        ...(this.source !== undefined ? { source: this.source } : {}),
      };
      return Object.freeze(ruleSet);
    });
  }
}

/**
 * Validate and compile one rule set definition.
 *
 * @returns One RuleSet per `match` item, in order
 * @throws SnippetConfigError for any invalid definition
 */
export function compileRuleSets(definition: unknown, options: CompileOptions = {}): RuleSet[] {
  const parsed = ruleSetDefinitionSchema.safeParse(definition);
  if (!parsed.success) {
    const id = typeof definition === 'object' && definition !== null && 'id' in definition && typeof definition.id === 'string'
      ? definition.id
      : undefined;
    throw new SnippetConfigError(`Invalid rule set: ${describeIssues(parsed.error)}`, id, options.source);
  }

  const formatters = options.formatters ?? createFormatterRegistry();
  return new DefinitionCompiler(parsed.data, formatters, options.source).compile();
}

/**
 * Parse the contents of a *.snippet.yaml file.
 *
 * @throws SnippetConfigError for YAML or validation errors
 */
export function parseSnippetSpec(content: string, options: CompileOptions = {}): RuleSet[] {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SnippetConfigError(`Failed to parse YAML: ${message}`, undefined, options.source);
  }

  const spec = snippetSpecSchema.safeParse(raw);
  if (!spec.success) {
    throw new SnippetConfigError(`Invalid snippet spec: ${describeIssues(spec.error)}`, undefined, options.source);
  }

  return spec.data.snippets.flatMap(definition => compileRuleSets(definition, options));
}

// ============================================================================
// Discovery
// ============================================================================

/**
 * Result of loading all snippet rule files.
 */
export interface SnippetLoadResult {
  ruleSets: RuleSet[];
  /** Files loaded, relative to the base path, in load order */
  files: string[];
}

/**
 * Recursively find all *.snippet.yaml files in a directory.
 */
async function findSnippetFiles(dirPath: string, recursive: boolean): Promise<string[]> {
  const files: string[] = [];
  const entries = await readdir(dirPath, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = join(dirPath, entry.name);

    if (entry.isDirectory()) {
      if (recursive) {
        files.push(...await findSnippetFiles(fullPath, recursive));
      }
    } else if (entry.isFile() && entry.name.endsWith(SNIPPET_PATTERN)) {
      files.push(fullPath);
    }
  }

  return files;
}

/**
 * Load every *.snippet.yaml file under a directory, sorted by path.
 *
 * @param options.basePath - Root directory to search
 * @param options.recursive - Whether to descend into subdirectories (default true)
 * @throws SnippetConfigError on the first invalid file
 */
export async function loadAllSnippetSpecs(options: {
  basePath: string;
  recursive?: boolean;
  formatters?: FormatterRegistry;
}): Promise<SnippetLoadResult> {
  const recursive = options.recursive ?? true;

  try {
    const stats = await stat(options.basePath);
    if (!stats.isDirectory()) {
      throw new SnippetConfigError(`Not a directory: ${options.basePath}`);
    }
  } catch (err) {
    if (err instanceof SnippetConfigError) throw err;
    throw new SnippetConfigError(`Snippet directory does not exist: ${options.basePath}`);
  }

  const filePaths = (await findSnippetFiles(options.basePath, recursive)).sort();
  const formatters = options.formatters ?? createFormatterRegistry();

  const ruleSets: RuleSet[] = [];
  const files: string[] = [];

  for (const filePath of filePaths) {
    const source = relative(options.basePath, filePath);
    const content = await readFile(filePath, 'utf-8');
    ruleSets.push(...parseSnippetSpec(content, { formatters, source }));
    files.push(source);
  }

  return { ruleSets, files };
}
