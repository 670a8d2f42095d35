/**
 * PrepareTransformer - 컬럼 준비 변환기
 *
 * 제외 컬럼을 제거하고 남은 컬럼을 분류합니다.
 * 연도 컬럼은 이후 단계를 위해 오름차순으로 정렬해 둡니다.
 */

import { classifyColumns, sortYearColumns } from '../ColumnClassifier';
import { ArqueroEngine } from '../engines/ArqueroEngine';
import type { Transformer, TransformContext } from './Transformer';
import { PipelinePhase } from './Transformer';

export class PrepareTransformer implements Transformer {
  readonly name = 'PrepareTransformer';
  readonly phase = PipelinePhase.PREPARE;

  private readonly excludeColumns: readonly string[];

  constructor(excludeColumns: readonly string[] = []) {
    this.excludeColumns = excludeColumns;
  }

  transform(ctx: TransformContext): TransformContext {
    const { yearColumns, excluded } = classifyColumns(ctx.table.columns, this.excludeColumns);

    const table =
      excluded.length > 0
        ? new ArqueroEngine(ctx.table).select(
            ctx.table.columns.filter((column) => !excluded.includes(column))
          )
        : ctx.table;

    return { ...ctx, table, yearColumns: sortYearColumns(yearColumns) };
  }
}
