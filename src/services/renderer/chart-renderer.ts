// src/services/renderer/chart-renderer.ts

import { ChartSpec, ChartType } from '../../models/answer.model';

const WIDTH = 640;
const HEIGHT = 400;
const MARGIN = { top: 48, right: 24, bottom: 72, left: 72 };
const PALETTE = ['#4e79a7', '#f28e2b', '#e15759', '#76b7b2', '#59a14f', '#edc948', '#b07aa1', '#ff9da7', '#9c755f', '#bab0ac'];
const MAX_LABEL_CHARS = 14;

export function escapeXml(value: string): string {
    return value
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&apos;');
}

/** Coordinates with at most two decimals, so the same spec always gives the same bytes. */
function num(value: number): string {
    return String(Number(value.toFixed(2)));
}

function shorten(label: string): string {
    return label.length > MAX_LABEL_CHARS ? `${label.slice(0, MAX_LABEL_CHARS - 1)}…` : label;
}

/** Smallest 1, 2 or 5 times a power of ten that is at least `value`. */
export function niceCeiling(value: number): number {
    if (value <= 0) return 0;
    const magnitude = 10 ** Math.floor(Math.log10(value));
    for (const step of [1, 2, 5, 10]) {
        if (step * magnitude >= value) return step * magnitude;
    }
    return 10 * magnitude;
}

/** Axis range that always includes zero, rounded outwards with niceCeiling. */
export function axisBounds(values: number[]): { low: number; high: number } {
    let max = 0;
    let min = 0;
    for (const value of values) {
        if (value > max) max = value;
        if (value < min) min = value;
    }
    return { low: min < 0 ? -niceCeiling(-min) : 0, high: niceCeiling(max) };
}

interface Plot {
    x: number;
    y: number;
    width: number;
    height: number;
    low: number;
    high: number;
    scaleY: (value: number) => number;
}

function plotArea(values: number[]): Plot {
    const x = MARGIN.left;
    const y = MARGIN.top;
    const width = WIDTH - MARGIN.left - MARGIN.right;
    const height = HEIGHT - MARGIN.top - MARGIN.bottom;
    const { low, high } = axisBounds(values);
    const span = high - low || 1;
    return { x, y, width, height, low, high, scaleY: (value) => y + height - ((value - low) / span) * height };
}

function axes(plot: Plot, spec: ChartSpec): string[] {
    const parts: string[] = [];
    const span = plot.high - plot.low || 1;
    for (let i = 0; i <= 4; i++) {
        const tick = plot.low + (span * i) / 4;
        const ty = plot.scaleY(tick);
        parts.push(
            `<line class="grid" x1="${num(plot.x)}" y1="${num(ty)}" x2="${num(plot.x + plot.width)}" y2="${num(ty)}" stroke="#e0e0e0"/>`,
            `<text x="${num(plot.x - 8)}" y="${num(ty + 4)}" font-size="11" text-anchor="end">${num(tick)}</text>`,
        );
    }
    const zero = plot.scaleY(0);
    parts.push(
        `<line class="axis" x1="${num(plot.x)}" y1="${num(zero)}" x2="${num(plot.x + plot.width)}" y2="${num(zero)}" stroke="#333"/>`,
        `<line class="axis" x1="${num(plot.x)}" y1="${num(plot.y)}" x2="${num(plot.x)}" y2="${num(plot.y + plot.height)}" stroke="#333"/>`,
    );

    const band = plot.width / spec.labels.length;
    spec.labels.forEach((label, i) => {
        const cx = plot.x + band * (i + 0.5);
        parts.push(
            `<text class="category" x="${num(cx)}" y="${num(plot.y + plot.height + 18)}" font-size="11" text-anchor="middle">${escapeXml(shorten(label))}</text>`,
        );
    });

    if (spec.xLabel) {
        parts.push(`<text x="${num(plot.x + plot.width / 2)}" y="${HEIGHT - 16}" font-size="12" text-anchor="middle">${escapeXml(spec.xLabel)}</text>`);
    }
    if (spec.yLabel) {
        const cy = plot.y + plot.height / 2;
        parts.push(`<text x="16" y="${num(cy)}" font-size="12" text-anchor="middle" transform="rotate(-90 16 ${num(cy)})">${escapeXml(spec.yLabel)}</text>`);
    }
    return parts;
}

function barChart(spec: ChartSpec): string[] {
    const plot = plotArea(spec.values);
    const band = plot.width / spec.values.length;
    const barWidth = band * 0.7;
    const zero = plot.scaleY(0);
    const bars = spec.values.map((value, i) => {
        const top = Math.min(plot.scaleY(value), zero);
        const height = Math.abs(plot.scaleY(value) - zero);
        const x = plot.x + band * i + (band - barWidth) / 2;
        return `<rect class="bar" x="${num(x)}" y="${num(top)}" width="${num(barWidth)}" height="${num(height)}" fill="${PALETTE[i % PALETTE.length]}"><title>${escapeXml(spec.labels[i])}: ${num(value)}</title></rect>`;
    });
    return [...axes(plot, spec), ...bars];
}

function lineChart(spec: ChartSpec): string[] {
    const plot = plotArea(spec.values);
    const band = plot.width / spec.values.length;
    const points = spec.values.map((value, i) => ({ x: plot.x + band * (i + 0.5), y: plot.scaleY(value), value }));
    const path = points.map((p) => `${num(p.x)},${num(p.y)}`).join(' ');
    return [
        ...axes(plot, spec),
        `<polyline class="line" points="${path}" fill="none" stroke="${PALETTE[0]}" stroke-width="2"/>`,
        ...points.map(
            (p, i) =>
                `<circle class="point" cx="${num(p.x)}" cy="${num(p.y)}" r="4" fill="${PALETTE[0]}"><title>${escapeXml(spec.labels[i])}: ${num(p.value)}</title></circle>`,
        ),
    ];
}

function pieChart(spec: ChartSpec): string[] {
    const cx = 220;
    const cy = 220;
    const r = 140;
    const total = spec.values.reduce((sum, value) => sum + value, 0);
    const parts: string[] = [];

    let angle = -Math.PI / 2;
    spec.values.forEach((value, i) => {
        const color = PALETTE[i % PALETTE.length];
        const share = total > 0 ? value / total : 0;
        if (share >= 1) {
            parts.push(`<circle class="slice" cx="${cx}" cy="${cy}" r="${r}" fill="${color}"/>`);
        } else if (share > 0) {
            const end = angle + share * 2 * Math.PI;
            const large = share > 0.5 ? 1 : 0;
            parts.push(
                `<path class="slice" d="M ${cx} ${cy} L ${num(cx + r * Math.cos(angle))} ${num(cy + r * Math.sin(angle))} ` +
                    `A ${r} ${r} 0 ${large} 1 ${num(cx + r * Math.cos(end))} ${num(cy + r * Math.sin(end))} Z" fill="${color}"/>`,
            );
            angle = end;
        }
        const legendY = MARGIN.top + 24 + i * 20;
        parts.push(
            `<rect class="legend" x="400" y="${legendY - 10}" width="12" height="12" fill="${color}"/>`,
            `<text x="418" y="${legendY}" font-size="12">${escapeXml(shorten(spec.labels[i]))} (${num(share * 100)}%)</text>`,
        );
    });
    return parts;
}

const CHART_BODIES: Record<ChartType, (spec: ChartSpec) => string[]> = {
    bar: barChart,
    line: lineChart,
    pie: pieChart,
};

/** Renders a chart spec as a standalone SVG document. Output is deterministic. */
export function renderChartSvg(spec: ChartSpec): string {
    if (spec.labels.length !== spec.values.length || spec.values.length === 0) {
        throw new Error('Chart needs one label per value and at least one value');
    }

    const body = CHART_BODIES[spec.type](spec);

    return [
        `<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${HEIGHT}" viewBox="0 0 ${WIDTH} ${HEIGHT}" font-family="sans-serif">`,
        `<rect width="${WIDTH}" height="${HEIGHT}" fill="#ffffff"/>`,
        `<text class="title" x="${WIDTH / 2}" y="28" font-size="16" text-anchor="middle">${escapeXml(spec.title)}</text>`,
        ...body,
        '</svg>',
    ].join('\n');
}
