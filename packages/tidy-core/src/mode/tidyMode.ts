import type { TidyReport } from "../decorator/decorator";
import type { DocumentTree } from "../parser/types";
import type { TidySession } from "../session/tidySession";

/** Supplies the current text of the document a mode is attached to */
export interface DocumentSource {
  getText(): string;
}

export type DocumentParser = (text: string) => DocumentTree;

export type TidyModeOptions = {
  session: TidySession;
  source: DocumentSource;
  parse: DocumentParser;
  /**
   * True when existing annotations no longer line up with a fresh parse, e.g.
   * because the host mapped them through edits. Saves then rebuild from scratch.
   */
  needsRefresh?: () => boolean;
};

/**
 * Trigger surface for a tidy session: enable, disable, toggle and the
 * pre-save hook all funnel into `tidy` or `untidy`.
 */
export class TidyMode {
  readonly session: TidySession;
  private readonly source: DocumentSource;
  private readonly parse: DocumentParser;
  private readonly needsRefresh: () => boolean;
  private active = false;

  constructor(options: TidyModeOptions) {
    this.session = options.session;
    this.source = options.source;
    this.parse = options.parse;
    this.needsRefresh = options.needsRefresh ?? (() => false);
  }

  get isActive(): boolean {
    return this.active;
  }

  enable(): TidyReport {
    this.active = true;
    return this.runTidy();
  }

  disable(): void {
    this.active = false;
    this.session.untidy();
  }

  /** Pre-save hook; re-tidies only while the mode is on */
  handleSave(): TidyReport | null {
    if (!this.active) {
      return null;
    }
    if (this.session.isTidy && this.needsRefresh()) {
      return this.refresh();
    }
    return this.runTidy();
  }

  /** Untidy when anything is decorated, tidy otherwise */
  toggle(): void {
    if (this.session.isTidy) {
      this.session.untidy();
      return;
    }
    this.runTidy();
  }

  /** Drop every annotation and decorate from scratch */
  refresh(): TidyReport {
    this.session.untidy();
    return this.runTidy();
  }

  private runTidy(): TidyReport {
    return this.session.tidy(this.parse(this.source.getText()));
  }
}
