import { Injectable } from "@nestjs/common";
import { StandardService } from "@/common/base/composed.service";
import { WithConfiguration } from "@/common/base/mixins/configurable.mixin";
import type {
  AnomalyFlag,
  NormalizedRecord,
  QualityConfig,
  QualityScore,
  RecordSchema,
  SubScores,
  ValidationContext,
} from "@/common/types/core";
import { ErrorSeverity } from "@/common/types/error-handling";
import { ConfigurationError } from "@/error-handling/pipeline.errors";
import { DEFAULT_QUALITY_CONFIG, qualityConfigProblems } from "./quality-config";
import { ReferenceWindowStore } from "./reference-window.store";
import { assertValidSchema } from "./schema";
import { accuracyScore, completenessScore, computeAggregate, consistencyScore, zScore } from "./scoring";

const SUB_SCORE_TAGS = {
  completeness: "completeness_low",
  consistency: "consistency_low",
  accuracy: "accuracy_low",
} as const;

function compactName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]/g, "");
}

/**
 * Scores normalized records against a schema.
 *
 * The only exception `validate` raises is SchemaError; every data problem is expressed
 * through the sub-scores and flags. Reference values are appended to the symbol's window
 * after the record has been scored against it.
 */
@Injectable()
export class QualityValidatorService extends WithConfiguration<QualityConfig>(DEFAULT_QUALITY_CONFIG)(StandardService) {
  private readonly checkedSchemas = new WeakSet<RecordSchema>();

  constructor(private readonly windows: ReferenceWindowStore) {
    super();
  }

  override validateConfig(config: QualityConfig): void {
    const problems = qualityConfigProblems(config);
    if (problems.length > 0) {
      throw new ConfigurationError(`Invalid quality configuration: ${problems.join("; ")}`, problems);
    }
  }

  async validate(record: NormalizedRecord, schema: RecordSchema, context: ValidationContext = {}): Promise<QualityScore> {
    if (!this.checkedSchemas.has(schema)) {
      assertValidSchema(schema);
      this.checkedSchemas.add(schema);
    }

    const config = this.config;
    const completeness = completenessScore(record, schema);
    const consistency = consistencyScore(record, schema, Date.now());

    const referenceValue = schema.referenceField ? record.fields[schema.referenceField] : undefined;
    const numericValue = typeof referenceValue === "number" && Number.isFinite(referenceValue) ? referenceValue : undefined;

    const windowKey = { symbol: record.symbol, schemaName: schema.name, field: schema.referenceField ?? "" };
    const score = await this.windows.update(windowKey, config.windowSize, window => {
      const reference = context.referenceValue ?? (window.length > 0 ? window[window.length - 1] : undefined);
      const scores: SubScores = {
        completeness: completeness.score,
        consistency: consistency.score,
        accuracy: accuracyScore(numericValue, reference, config.accuracyTolerance),
      };

      const flags = this.subScoreFlags(scores, config, {
        completeness: completeness.missing.length > 0 ? `missing: ${completeness.missing.join(", ")}` : "",
        consistency: consistency.violations.join("; "),
        accuracy: reference !== undefined ? `reference ${reference}` : "",
      });

      if (numericValue !== undefined && schema.referenceField) {
        const z = zScore(numericValue, window, config.windowMinPoints);
        if (z !== null && z > config.zScoreThreshold) {
          flags.push({
            tag: "statistical_outlier",
            severity: ErrorSeverity.MEDIUM,
            field: schema.referenceField,
            message: `${schema.referenceField} ${numericValue} is ${Number.isFinite(z) ? `${z.toFixed(2)} standard deviations` : "away"} from the last ${window.length} observations`,
          });
        }
      }

      flags.push(...this.sensitiveFieldFlags(record, config.sensitiveFields));

      const result: QualityScore = Object.freeze({
        ...scores,
        aggregate: computeAggregate(scores, config.weights),
        flags: Object.freeze(flags),
      });
      return { result, append: numericValue };
    });

    this.incrementCounter("validations");
    if (score.flags.length > 0) {
      this.incrementCounter("flagged");
      this.logDebug(`${record.symbol} flagged: ${score.flags.map(flag => flag.tag).join(", ")}`, record.provenance.requestId);
    }
    return score;
  }

  private subScoreFlags(
    scores: SubScores,
    config: QualityConfig,
    details: Record<keyof SubScores, string>
  ): AnomalyFlag[] {
    const flags: AnomalyFlag[] = [];
    for (const name of ["completeness", "consistency", "accuracy"] as const) {
      const { threshold, severity } = config.thresholds[name];
      if (scores[name] < threshold) {
        const detail = details[name] ? ` (${details[name]})` : "";
        flags.push({
          tag: SUB_SCORE_TAGS[name],
          severity,
          message: `${name} ${scores[name].toFixed(2)} is below ${threshold}${detail}`,
        });
      }
    }
    return flags;
  }

  private sensitiveFieldFlags(record: NormalizedRecord, sensitiveFields: readonly string[]): AnomalyFlag[] {
    const patterns = sensitiveFields.map(compactName).filter(pattern => pattern.length > 0);

    return Object.entries(record.fields)
      .filter(([name, value]) => value !== null && patterns.some(pattern => compactName(name).includes(pattern)))
      .map(([name]) => ({
        tag: "sensitive_field" as const,
        severity: ErrorSeverity.CRITICAL,
        field: name,
        message: `${name} looks like personal data`,
      }));
  }
}
