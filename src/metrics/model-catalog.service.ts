import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile } from 'node:fs/promises';
import { SmartplugEnv } from '../config/smartplug.config';
import {
  DEFAULT_MODEL_CATALOG,
  ExtensionItem,
  isWellFormedExtension,
  ModelCatalog,
  modelCatalogSchema,
  parseExtensionEntry,
} from './model-catalog';

/**
 * ModelCatalogService - per-model line budgets and extra metrics
 *
 * Uses the built-in catalog unless SMARTPLUG_MODEL_CATALOG names a JSON
 * file, which then replaces it entirely. The file is loaded and checked
 * for structure when the module starts; the grammar of extension entries
 * is checked later by the preflight gate so a bad entry is reported as an
 * initialization failure.
 */
@Injectable()
export class ModelCatalogService implements OnModuleInit {
  private readonly logger = new Logger(ModelCatalogService.name);
  private catalog: ModelCatalog = DEFAULT_MODEL_CATALOG;

  constructor(private readonly configService: ConfigService<SmartplugEnv, true>) {}

  async onModuleInit(): Promise<void> {
    const catalogPath = this.configService.get('SMARTPLUG_MODEL_CATALOG', {
      infer: true,
    });
    if (catalogPath) {
      this.catalog = await this.loadFromFile(catalogPath);
    }
    this.logger.debug(
      `Known models: ${Object.keys(this.catalog.lineBudgets).join(', ')}`,
    );
  }

  getCatalog(): ModelCatalog {
    return this.catalog;
  }

  /**
   * Number of trailing sysinfo lines for a model, matched exactly.
   */
  lineBudgetFor(hardwareModel: string): number | undefined {
    if (!Object.hasOwn(this.catalog.lineBudgets, hardwareModel)) {
      return undefined;
    }
    return this.catalog.lineBudgets[hardwareModel];
  }

  /**
   * Extra metrics for a model, empty when it has none.
   */
  extensionFor(hardwareModel: string): ExtensionItem[] {
    if (!Object.hasOwn(this.catalog.extensions, hardwareModel)) {
      return [];
    }
    return parseExtensionEntry(this.catalog.extensions[hardwareModel]);
  }

  /**
   * Every extension entry that does not follow `name[:alias](,name[:alias])*`
   */
  findMalformedExtensions(): Array<{ model: string; entry: string }> {
    return Object.entries(this.catalog.extensions)
      .filter(([, entry]) => !isWellFormedExtension(entry))
      .map(([model, entry]) => ({ model, entry }));
  }

  private async loadFromFile(catalogPath: string): Promise<ModelCatalog> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(catalogPath, 'utf-8'));
    } catch (error) {
      throw new Error(
        `Cannot read model catalog ${catalogPath}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    const result = modelCatalogSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new Error(`Invalid model catalog ${catalogPath}: ${issues}`);
    }

    this.logger.log(`Loaded model catalog from ${catalogPath}`);
    return result.data;
  }
}
