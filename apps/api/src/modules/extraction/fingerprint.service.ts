import { createHash } from 'node:crypto';
import { Injectable } from '@nestjs/common';
import { sectionFieldNames } from '@sheetstruct/shared';
import type { SheetResult } from '@sheetstruct/shared';

/** `[sheet name, section type, section header, sorted field names]` */
export type StructureTuple = [string, string, string, string[]];

/** Sheet names in workbook order, then one tuple per section */
export interface Structure {
  sheets: string[];
  sections: StructureTuple[];
}

@Injectable()
export class FingerprintService {
  /**
   * MD5 hex digest of the document's structural shape, empty sheets
   * included. Data values, row counts and confidences do not contribute.
   */
  compute(sheets: readonly SheetResult[]): string {
    return createHash('md5').update(JSON.stringify(this.structure(sheets))).digest('hex');
  }

  structure(sheets: readonly SheetResult[]): Structure {
    return {
      sheets: sheets.map((sheet) => sheet.sheet_name),
      sections: sheets.flatMap((sheet) =>
        sheet.sections.map((section): StructureTuple => [
          sheet.sheet_name,
          section.section_type,
          section.section_header ?? '',
          [...sectionFieldNames(section)].sort(),
        ]),
      ),
    };
  }
}
