import { Injectable } from '@nestjs/common';
import { buildClientId, ENGINE_VERSION } from '@sheetstruct/shared';
import type { ClientDocument, ClientIdentity, FileMetadata, Section, SheetResult } from '@sheetstruct/shared';
import { FingerprintService } from './fingerprint.service';
import type { ExtractedSheet, SectionDraft } from './extraction.types';

export interface AssemblyInput {
  identity: ClientIdentity;
  file?: FileMetadata;
  filePath?: string | null;
  processedAt?: Date;
}

@Injectable()
export class DocumentAssemblerService {
  constructor(private readonly fingerprint: FingerprintService) {}

  /**
   * Aggregate extracted sheets into one document. Section ids run
   * `section_1, section_2…` across the whole workbook in sheet order.
   * The returned document is deeply frozen.
   */
  assemble(sheets: readonly ExtractedSheet[], input: AssemblyInput): ClientDocument {
    const { identity, file = {} } = input;
    let nextId = 1;

    const sheetResults: SheetResult[] = sheets.map((sheet) => ({
      sheet_name: sheet.sheetName,
      sections: sheet.sections.map((draft) => withId(draft, `section_${nextId++}`)),
    }));

    const formVariant = file.form_variant ?? null;
    const document: ClientDocument = {
      client_id:
        identity.client_id ??
        buildClientId({
          country: identity.country,
          client_name: identity.client_name,
          product: identity.product,
          form_variant: formVariant,
        }),
      client_name: identity.client_name,
      country: identity.country,
      product: identity.product,
      file_info: {
        file_path: input.filePath ?? null,
        filename: file.filename ?? null,
        extracted_date: file.extracted_date ?? null,
        is_latest: file.is_latest ?? false,
        form_variant: formVariant,
      },
      sheets: sheetResults,
      pattern_signature: this.fingerprint.compute(sheetResults),
      processing_metadata: {
        processed_at: (input.processedAt ?? new Date()).toISOString(),
        status: 'success',
        engine_version: ENGINE_VERSION,
        warnings: sheets.flatMap((s) => s.warnings),
      },
    };

    return deepFreeze(document);
  }
}

function withId(draft: SectionDraft, sectionId: string): Section {
  return { ...draft, section_id: sectionId };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
