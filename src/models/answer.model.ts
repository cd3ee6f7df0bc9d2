// src/models/answer.model.ts

export type TableCell = string | number | null;
export type TableRow = Record<string, TableCell>;

export interface TableData {
    columns: string[];
    rows: TableRow[];
}

export type ChartType = 'bar' | 'line' | 'pie';

export interface ChartSpec {
    type: ChartType;
    title: string;
    xLabel: string;
    yLabel: string;
    labels: string[];
    values: number[];
}

export interface AnswerResult {
    answer: string;
    table?: TableRow[];
    /** Base64 encoded chart image. */
    graph?: string;
    graphFormat?: 'svg';
    sessionId: string;
}

export interface UploadResult {
    sessionId: string;
    filesProcessed: number;
    recordsIndexed: number;
    droppedRecords: number;
    warnings: string[];
}
