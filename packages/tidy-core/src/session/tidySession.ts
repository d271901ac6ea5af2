import { DEFAULT_TIDY_CONFIG, type TidyConfig } from "../config";
import { type TidyReport, tidy } from "../decorator/decorator";
import { getLogger, type TidyLogger } from "../logger";
import type { DocumentTree } from "../parser/types";
import { DecorationRegistry } from "../registry/decorationRegistry";
import { type RestoreReport, untidy } from "../restorer/restorer";
import type { AnnotationHost, DecorationRecord } from "../types";

export type TidySessionOptions = {
  host: AnnotationHost;
  config?: TidyConfig;
  logger?: TidyLogger;
  /** Bound onto every log line of this session */
  documentId?: string;
};

/**
 * Tidy state of one open document: its registry, the host annotations are
 * drawn into, and the configuration in force. Each document gets its own.
 */
export class TidySession {
  readonly registry = new DecorationRegistry();
  private readonly host: AnnotationHost;
  private readonly logger: TidyLogger;
  private config: TidyConfig;

  constructor(options: TidySessionOptions) {
    this.host = options.host;
    this.config = options.config ?? DEFAULT_TIDY_CONFIG;
    const logger = options.logger ?? getLogger();
    this.logger = logger.child({
      module: "tidy-session",
      ...(options.documentId ? { documentId: options.documentId } : {}),
    });
  }

  getConfig(): TidyConfig {
    return this.config;
  }

  /** Takes effect on the next pass; existing annotations keep their style */
  setConfig(config: TidyConfig): void {
    this.config = config;
  }

  get isTidy(): boolean {
    return this.registry.size > 0;
  }

  records(): readonly DecorationRecord[] {
    return this.registry.records();
  }

  tidy(tree: DocumentTree): TidyReport {
    const report = tidy({ registry: this.registry, host: this.host }, tree, this.config);
    this.logger.debug("Tidy pass complete", { ...report, records: this.registry.size });
    return report;
  }

  untidy(): RestoreReport {
    try {
      const report = untidy({ registry: this.registry, host: this.host });
      this.logger.debug("Untidy complete", { ...report });
      return report;
    } catch (error) {
      this.logger.error(
        "Untidy left annotations behind",
        error instanceof Error ? error : { error: String(error) }
      );
      throw error;
    }
  }
}
