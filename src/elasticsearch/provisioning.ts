/**
 * Index provisioning
 *
 * Idempotent startup setup: composable index template, ILM policy, the
 * current month's index and the alias pointing at it. Every step is
 * create-if-absent, so running it on every start is safe. A failing step
 * raises ProvisioningError, which aborts startup.
 */

import type { Client, estypes } from '@elastic/elasticsearch';
import { errors } from '@elastic/elasticsearch';
import { ProvisioningError } from '../errors/hierarchy.js';
import { getAliasName, getIndexName, getIndexPattern } from '../naming/index-naming.js';
import type { IndexConfig } from '../types/config.js';
import type { Clock, StructuredLogger } from '../types/index.js';
import { NullLogger, systemClock } from '../types/index.js';

export type StepOutcome = 'created' | 'exists' | 'updated';

export interface ProvisioningReport {
  template: StepOutcome;
  policy: StepOutcome;
  index: StepOutcome;
  alias: StepOutcome;
  indexName: string;
  aliasName: string;
}

export function buildCategoryMappings(): estypes.MappingTypeMapping {
  return {
    properties: {
      id: { type: 'keyword' },
      name: {
        type: 'text',
        analyzer: 'custom_analyzer',
        fields: {
          keyword: { type: 'keyword', ignore_above: 256 },
        },
      },
      description: { type: 'text', analyzer: 'custom_analyzer' },
      status: { type: 'integer' },
      created_at: { type: 'date' },
      updated_at: { type: 'date' },
      version: { type: 'long' },
      sync_status: { type: 'keyword' },
      last_sync: { type: 'date' },
    },
  };
}

export function buildTemplateSettings(config: IndexConfig): estypes.IndicesIndexSettings {
  return {
    number_of_shards: config.shards,
    number_of_replicas: config.replicas,
    refresh_interval: '1s',
    analysis: {
      analyzer: {
        custom_analyzer: {
          type: 'custom',
          tokenizer: 'standard',
          filter: ['lowercase', 'asciifolding'],
        },
      },
    },
  };
}

/**
 * hot (rollover 30d/50gb) → warm at 30d (shrink, forcemerge) → cold at 60d → delete at 90d
 */
export function buildLifecyclePolicy(): estypes.IlmPolicy {
  return {
    phases: {
      hot: {
        min_age: '0ms',
        actions: {
          rollover: { max_age: '30d', max_size: '50gb' },
          set_priority: { priority: 100 },
        },
      },
      warm: {
        min_age: '30d',
        actions: {
          shrink: { number_of_shards: 1 },
          forcemerge: { max_num_segments: 1 },
          set_priority: { priority: 50 },
        },
      },
      cold: {
        min_age: '60d',
        actions: {
          set_priority: { priority: 0 },
        },
      },
      delete: {
        min_age: '90d',
        actions: {
          delete: {},
        },
      },
    },
  };
}

function isStatus(error: unknown, status: number): boolean {
  return error instanceof errors.ResponseError && error.meta.statusCode === status;
}

function isAlreadyExists(error: unknown): boolean {
  return (
    error instanceof errors.ResponseError &&
    error.meta.statusCode === 400 &&
    error.message.includes('resource_already_exists_exception')
  );
}

export interface IndexProvisionerOptions {
  index: IndexConfig;
  clock?: Clock;
  logger?: StructuredLogger;
}

export class IndexProvisioner {
  private readonly config: IndexConfig;
  private readonly clock: Clock;
  private readonly logger: StructuredLogger;

  constructor(
    private readonly client: Client,
    options: IndexProvisionerOptions,
  ) {
    this.config = options.index;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? new NullLogger();
  }

  /**
   * Run every provisioning step in order
   *
   * @throws ProvisioningError naming the failed step
   */
  async provision(): Promise<ProvisioningReport> {
    const template = await this.step('template', () => this.ensureTemplate());
    const policy = await this.step('policy', () => this.ensurePolicy());
    const current = await this.ensureCurrentIndex();

    const report: ProvisioningReport = { template, policy, ...current };
    this.logger.info('Elasticsearch provisioning completed', { ...report });
    return report;
  }

  /**
   * Create this month's index if absent and point the alias at it.
   * Also run periodically so the alias follows the monthly rotation.
   */
  async ensureCurrentIndex(): Promise<Pick<ProvisioningReport, 'index' | 'alias' | 'indexName' | 'aliasName'>> {
    const naming = { ...this.config, date: this.clock() };
    const indexName = getIndexName(naming);
    const aliasName = getAliasName(naming);

    const index = await this.step('index', () => this.ensureIndex(indexName));
    const alias = await this.step('alias', () => this.ensureAlias(indexName, aliasName));

    return { index, alias, indexName, aliasName };
  }

  async ensureTemplate(): Promise<StepOutcome> {
    const { templateName, service, entity } = this.config;

    if (await this.client.indices.existsIndexTemplate({ name: templateName })) {
      this.logger.debug('Index template already exists', { templateName });
      return 'exists';
    }

    await this.client.indices.putIndexTemplate({
      name: templateName,
      index_patterns: [getIndexPattern(service, entity)],
      template: {
        settings: buildTemplateSettings(this.config),
        mappings: buildCategoryMappings(),
      },
      priority: 100,
      version: 1,
      _meta: {
        description: `Template for ${entity} indices`,
        service,
      },
    });
    this.logger.info('Index template created', { templateName });
    return 'created';
  }

  async ensurePolicy(): Promise<StepOutcome> {
    const { policyName } = this.config;

    try {
      await this.client.ilm.getLifecycle({ name: policyName });
      this.logger.debug('Lifecycle policy already exists', { policyName });
      return 'exists';
    } catch (error) {
      if (!isStatus(error, 404)) throw error;
    }

    await this.client.ilm.putLifecycle({ name: policyName, policy: buildLifecyclePolicy() });
    this.logger.info('Lifecycle policy created', { policyName });
    return 'created';
  }

  async ensureIndex(indexName: string): Promise<StepOutcome> {
    if (await this.client.indices.exists({ index: indexName })) {
      return 'exists';
    }

    try {
      await this.client.indices.create({ index: indexName });
    } catch (error) {
      // Another instance won the race
      if (isAlreadyExists(error)) return 'exists';
      throw error;
    }
    this.logger.info('Index created', { indexName });
    return 'created';
  }

  /**
   * Point `aliasName` at `indexName` only, moving it off older months atomically
   */
  async ensureAlias(indexName: string, aliasName: string): Promise<StepOutcome> {
    let current: string[] = [];
    if (await this.client.indices.existsAlias({ name: aliasName })) {
      const response = await this.client.indices.getAlias({ name: aliasName });
      current = Object.keys(response);
    }

    if (current.length === 1 && current[0] === indexName) {
      return 'exists';
    }

    const actions: estypes.IndicesUpdateAliasesAction[] = current
      .filter((name) => name !== indexName)
      .map((name) => ({ remove: { index: name, alias: aliasName } }));
    if (!current.includes(indexName)) {
      actions.push({ add: { index: indexName, alias: aliasName } });
    }

    await this.client.indices.updateAliases({ actions });
    this.logger.info('Alias updated', { aliasName, indexName, previous: current });
    return current.length === 0 ? 'created' : 'updated';
  }

  private async step(name: string, fn: () => Promise<StepOutcome>): Promise<StepOutcome> {
    try {
      return await fn();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ProvisioningError(`Provisioning step "${name}" failed: ${message}`, name, { cause: error });
    }
  }
}
