/**
 * TableLoader - 원본 파일 로더
 *
 * 파일 확장자에 따라 CSV(papaparse) 또는 XLSX(SheetJS) 파서를 고릅니다.
 * 실패는 모두 DatasetLoadError로 감싸서 던집니다.
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import type { DataTable } from '../types';
import { DatasetLoadError } from '../core/errors';
import { parseCsvText } from './parseCsv';
import { parseWorkbook } from './workbook';

/**
 * 로더 인터페이스
 *
 * 테스트에서는 메모리 로더로 바꿔 끼울 수 있습니다.
 */
export interface TableLoader {
  load(filePath: string): Promise<DataTable>;
}

/** 지원하는 확장자 */
export const SUPPORTED_EXTENSIONS = ['.csv', '.xlsx', '.xls'] as const;

type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

function isSupportedExtension(extension: string): extension is SupportedExtension {
  return SUPPORTED_EXTENSIONS.some((supported) => supported === extension);
}

/**
 * 파일 시스템 로더
 */
export class FileTableLoader implements TableLoader {
  async load(filePath: string): Promise<DataTable> {
    const extension = path.extname(filePath).toLowerCase();
    if (!isSupportedExtension(extension)) {
      throw new DatasetLoadError(
        filePath,
        `unsupported file type "${extension}" (expected ${SUPPORTED_EXTENSIONS.join(', ')})`
      );
    }

    let bytes: Buffer;
    try {
      bytes = await readFile(filePath);
    } catch (error) {
      throw new DatasetLoadError(filePath, 'file could not be read', error);
    }

    try {
      return extension === '.csv' ? parseCsvText(bytes.toString('utf8')) : parseWorkbook(bytes);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DatasetLoadError(filePath, reason, error);
    }
  }
}
