/**
 * Config Service
 * Validated pipeline settings plus the source and schema definitions from sources.json
 */

import { Injectable } from "@nestjs/common";
import { StandardService } from "@/common/base/composed.service";
import type { SourceDefinition } from "@/common/types/adapters";
import type { RecordSchema } from "@/common/types/core";
import { schemaProblems } from "@/validation/schema";
import { ENV } from "./environment.constants";
import { assertValidPipelineConfig, buildPipelineConfig, pipelineConfigProblems, type PipelineConfig } from "./pipeline-config";
import { loadSourcesFile, type SourcesFile } from "./sources.loader";

export interface ConfigServiceOptions {
  sourcesPath?: string;
  /** Use these definitions instead of reading a file */
  sources?: SourcesFile;
  pipeline?: Partial<PipelineConfig>;
}

export interface ConfigValidationReport {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

@Injectable()
export class ConfigService extends StandardService {
  private readonly pipelineConfig: PipelineConfig;
  private readonly sourcesFile: SourcesFile;

  constructor(options: ConfigServiceOptions = {}) {
    super();
    this.pipelineConfig = buildPipelineConfig(options.pipeline);
    assertValidPipelineConfig(this.pipelineConfig);

    const sourcesPath = options.sourcesPath ?? ENV.SOURCES.CONFIG_PATH;
    this.sourcesFile = options.sources ?? loadSourcesFile(sourcesPath);
    this.logger.log(
      `Loaded ${this.sourcesFile.sources.length} source(s) and ${this.sourcesFile.schemas.length} schema(s)${options.sources ? "" : ` from ${sourcesPath}`}`
    );
  }

  getPipelineConfig(): Readonly<PipelineConfig> {
    return this.pipelineConfig;
  }

  getSourceDefinitions(): SourceDefinition[] {
    return [...this.sourcesFile.sources];
  }

  getSchemas(): RecordSchema[] {
    return [...this.sourcesFile.schemas];
  }

  validateConfiguration(): ConfigValidationReport {
    const errors = pipelineConfigProblems(this.pipelineConfig);
    const warnings: string[] = [];

    for (const schema of this.sourcesFile.schemas) {
      errors.push(...schemaProblems(schema).map(problem => `schema ${schema.name}: ${problem}`));
    }

    for (const source of this.sourcesFile.sources) {
      if (source.enabled === false) {
        warnings.push(`Source ${source.id} is disabled`);
        continue;
      }
      if (!source.schemaName) {
        warnings.push(`Source ${source.id} has no default schema; requests must name one`);
      }
      if (source.kind === "database" && !process.env[source.database.uriEnv]) {
        warnings.push(`Source ${source.id} needs ${source.database.uriEnv} to be set`);
      }
      if (source.kind === "rest" && source.rest.apiKeyEnv && !process.env[source.rest.apiKeyEnv]) {
        warnings.push(`Source ${source.id} expects an API key in ${source.rest.apiKeyEnv}`);
      }
    }

    if (this.sourcesFile.sources.length === 0) {
      warnings.push("No sources configured");
    }

    return { isValid: errors.length === 0, errors, warnings };
  }
}
