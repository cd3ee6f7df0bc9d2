// src/services/renderer/response-renderer.ts

import { AnswerResult, TableData, TableRow } from '../../models/answer.model';
import { OrchestratorOutput } from '../query/query-orchestrator';
import { renderChartSvg } from './chart-renderer';

/** Rows with keys in column order; missing cells become null. */
export function tableRows(table: TableData): TableRow[] {
    return table.rows.map((row) => {
        const ordered: TableRow = {};
        for (const column of table.columns) {
            ordered[column] = row[column] ?? null;
        }
        return ordered;
    });
}

export function encodeChart(svg: string): string {
    return Buffer.from(svg, 'utf8').toString('base64');
}

/**
 * Turns orchestrator output into the outward answer shape. Pure: the same
 * output always renders to the same result.
 */
export function renderAnswer(output: OrchestratorOutput, sessionId: string): AnswerResult {
    const result: AnswerResult = { answer: output.answer, sessionId };

    if (output.table && output.table.rows.length > 0) {
        result.table = tableRows(output.table);
    }
    if (output.chart) {
        result.graph = encodeChart(renderChartSvg(output.chart));
        result.graphFormat = 'svg';
    }
    return result;
}
