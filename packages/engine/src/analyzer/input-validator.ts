import { InputError, isHeadingLevel, type Document, type Logger } from '@persona-docs/types';

/** 想定するコレクションの文書数 */
export const EXPECTED_DOCUMENT_RANGE = { min: 3, max: 10 } as const;

/**
 * 文書コレクションを検証
 * @returns セクションの総数
 * @throws InputError 空のコレクション、または不正な文書・セクションがある場合
 */
export function validateDocuments(documents: readonly Document[], logger: Logger = console): number {
  if (documents.length === 0) {
    throw new InputError('Document collection is empty');
  }

  if (documents.length < EXPECTED_DOCUMENT_RANGE.min || documents.length > EXPECTED_DOCUMENT_RANGE.max) {
    logger.warn(
      `[DocumentAnalyzer] Collection has ${documents.length} documents ` +
      `(expected ${EXPECTED_DOCUMENT_RANGE.min}-${EXPECTED_DOCUMENT_RANGE.max})`
    );
  }

  const filenames = new Set<string>();
  const sectionIds = new Set<string>();
  let totalSections = 0;

  documents.forEach((document, documentIndex) => {
    if (typeof document.filename !== 'string' || !document.filename.trim()) {
      throw new InputError(`documents[${documentIndex}].filename must be a non-empty string`);
    }
    if (filenames.has(document.filename)) {
      throw new InputError(`Duplicate document filename: ${document.filename}`);
    }
    filenames.add(document.filename);

    if (!Array.isArray(document.sections)) {
      throw new InputError(`${document.filename}: sections must be an array`);
    }

    let previousPosition = -1;
    for (const section of document.sections) {
      const where = `${document.filename} (position ${section.position})`;

      if (section.documentFilename !== document.filename) {
        throw new InputError(
          `${where}: section belongs to "${section.documentFilename}", not "${document.filename}"`
        );
      }
      if (!section.id) {
        throw new InputError(`${where}: section id must not be empty`);
      }
      if (sectionIds.has(section.id)) {
        throw new InputError(`${where}: duplicate section id "${section.id}"`);
      }
      sectionIds.add(section.id);

      if (!Number.isInteger(section.position) || section.position <= previousPosition) {
        throw new InputError(
          `${where}: positions must be integers increasing within a document`
        );
      }
      previousPosition = section.position;

      if (!Number.isInteger(section.pageNumber) || section.pageNumber < 1) {
        throw new InputError(`${where}: pageNumber must be an integer >= 1 (got ${section.pageNumber})`);
      }
      if (!isHeadingLevel(section.headingLevel)) {
        throw new InputError(`${where}: unknown heading level "${String(section.headingLevel)}"`);
      }
      if (typeof section.text !== 'string' || typeof section.heading !== 'string') {
        throw new InputError(`${where}: heading and text must be strings`);
      }
    }

    totalSections += document.sections.length;
  });

  if (totalSections === 0) {
    throw new InputError('Document collection contains no sections');
  }

  return totalSections;
}
