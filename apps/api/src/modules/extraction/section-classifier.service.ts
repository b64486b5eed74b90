import { Inject, Injectable, Logger } from '@nestjs/common';
import { cellKind, isBlank, textOf } from '@sheetstruct/shared';
import type { SectionFormatting, SectionType } from '@sheetstruct/shared';
import { EXTRACTION_CONFIG, type ClassifierWeights, type ExtractionConfig } from './extraction.config';
import { HeaderResolverService } from './header-resolver.service';
import {
  cellAt,
  formatAt,
  mergeIntersects,
  occupiedColumns,
  rowValues,
  spanHeight,
  spanWidth,
  type Classification,
  type Grid,
  type Span,
} from './extraction.types';

/** Everything a rule may look at for one span */
export interface RuleContext {
  grid: Grid;
  span: Span;
  body: Span;
  weights: ClassifierWeights;
  headerFormatted: boolean;
  headerRows: () => number;
}

/** Returns a confidence when the rule matches, null otherwise */
export interface ClassificationRule {
  type: Exclude<SectionType, 'raw'>;
  evaluate: (ctx: RuleContext) => number | null;
}

export const complexHeaderRule: ClassificationRule = {
  type: 'complex_header',
  evaluate: ({ grid, span, weights, headerRows }) => {
    const scanned: Span = {
      ...span,
      endRow: Math.min(span.endRow, span.startRow + weights.COMPLEX_HEADER_SCAN_ROWS - 1),
    };
    if (!grid.merges.some((m) => mergeIntersects(m, scanned))) return null;
    return weights.COMPLEX_HEADER_BASE + (headerRows() > 1 ? weights.COMPLEX_HEADER_MULTI_ROW_BONUS : 0);
  },
};

export const keyValueRule: ClassificationRule = {
  type: 'key_value',
  evaluate: ({ grid, body, weights, headerFormatted }) => {
    let populatedColumns = 0;
    for (let col = body.startCol; col <= body.endCol; col++) {
      for (let row = body.startRow; row <= body.endRow; row++) {
        if (!isBlank(cellAt(grid, row, col))) {
          populatedColumns++;
          break;
        }
      }
    }
    if (populatedColumns > weights.KEY_VALUE_MAX_COLUMNS) return null;

    let keys = 0;
    let textKeys = 0;
    for (let row = body.startRow; row <= body.endRow; row++) {
      const kind = cellKind(cellAt(grid, row, body.startCol));
      if (kind === 'blank') continue;
      keys++;
      if (kind === 'text') textKeys++;
    }
    if (keys === 0) return null;

    const ratio = textKeys / keys;
    if (ratio < weights.KEY_VALUE_MIN_TEXT_RATIO) return null;
    return ratio + (headerFormatted ? 0 : weights.KEY_VALUE_PLAIN_BONUS);
  },
};

export const tableRule: ClassificationRule = {
  type: 'table',
  evaluate: ({ grid, body, weights, headerFormatted }) => {
    const labels = rowValues(grid, body.startRow, body.startCol, body.endCol).map(textOf);
    const uniqueText =
      labels.every((l) => l !== null) && new Set(labels).size === labels.length;
    return (
      weights.TABLE_BASE +
      (headerFormatted ? weights.TABLE_FORMATTED_HEADER_BONUS : 0) +
      (uniqueText ? weights.TABLE_UNIQUE_HEADER_BONUS : 0)
    );
  },
};

/** Priority order: rarer, stronger signals first; table is the fallback */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [complexHeaderRule, keyValueRule, tableRule];

@Injectable()
export class SectionClassifierService {
  private readonly logger = new Logger(SectionClassifierService.name);

  constructor(
    @Inject(EXTRACTION_CONFIG) private readonly config: ExtractionConfig,
    private readonly headers: HeaderResolverService,
  ) {}

  classify(grid: Grid, span: Span, rules: readonly ClassificationRule[] = CLASSIFICATION_RULES): Classification {
    if (spanWidth(span) <= 0 || spanHeight(span) <= 0) {
      return this.raw(null);
    }

    const title = this.detectTitle(grid, span);
    const bodyStart = title === null ? span.startRow : span.startRow + 1;
    const bodyCols = occupiedColumns(grid, bodyStart, span.endRow);
    if (!bodyCols) {
      return this.raw(null);
    }
    const body: Span = { startRow: bodyStart, endRow: span.endRow, ...bodyCols };

    let headerRows: number | null = null;
    const ctx: RuleContext = {
      grid,
      span,
      body,
      weights: this.config.weights,
      headerFormatted: this.headers.isHeaderFormatted(grid, body.startRow, body.startCol, body.endCol),
      headerRows: () => (headerRows ??= this.headers.countHeaderRows(grid, body)),
    };

    for (const rule of rules) {
      const score = rule.evaluate(ctx);
      if (score === null) continue;

      const confidence = clampConfidence(score);
      if (confidence < this.config.weights.MIN_CONFIDENCE) {
        this.logger.debug(`Rows ${span.startRow}-${span.endRow}: ${rule.type} scored ${confidence}, falling back to raw`);
        return this.raw(span);
      }

      return {
        type: rule.type,
        confidence,
        header: title,
        body,
        headerRows: rule.type === 'complex_header' ? ctx.headerRows() : 1,
        formatting: this.formattingOf(grid, body),
      };
    }

    return this.raw(span);
  }

  /** A first row holding exactly one distinct text label, above at least one more row */
  detectTitle(grid: Grid, span: Span): string | null {
    if (spanHeight(span) < 2) return null;
    const populated = rowValues(grid, span.startRow, span.startCol, span.endCol).filter((v) => !isBlank(v));
    const labels = new Set<string>();
    for (const value of populated) {
      const label = textOf(value);
      if (label === null) return null;
      labels.add(label);
    }
    const [only] = labels;
    return labels.size === 1 && only !== undefined ? only : null;
  }

  private formattingOf(grid: Grid, body: Span): SectionFormatting | null {
    for (let col = body.startCol; col <= body.endCol; col++) {
      if (isBlank(cellAt(grid, body.startRow, col))) continue;
      const format = formatAt(grid, body.startRow, col);
      if (!format) return null;
      const border = format.border;
      return {
        bold: format.bold ?? false,
        italic: format.italic ?? false,
        fill_color: format.bgColor ?? null,
        font_color: format.fontColor ?? null,
        has_border: !!(border?.top || border?.right || border?.bottom || border?.left),
      };
    }
    return null;
  }

  private raw(body: Span | null): Classification {
    return { type: 'raw', confidence: 0, header: null, body, headerRows: 0, formatting: null };
  }
}

function clampConfidence(score: number): number {
  return Math.round(Math.min(1, Math.max(0, score)) * 10_000) / 10_000;
}
