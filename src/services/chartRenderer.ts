/**
 * Bar chart rendering for the statistics command.
 * Builds an SVG document from a dense bucket series and rasterises it to PNG
 * with sharp. Callers treat the result as an opaque image and fall back to
 * text when rendering throws.
 *
 * @module services/chartRenderer
 */

import sharp from "sharp";

export interface ChartSeries {
	title: string;
	labels: string[];
	values: number[];
}

export interface ChartRenderer {
	render(series: ChartSeries): Promise<Buffer>;
}

const CHART_WIDTH = 1000;
const CHART_HEIGHT = 560;
const MARGIN = { top: 70, right: 30, bottom: 80, left: 60 };

const COLORS = {
	background: "#FFFFFF",
	bar: "#4CAF50",
	barStroke: "#2E7D32",
	peak: "#FF9800",
	grid: "#E0E0E0",
	text: "#212121",
};

export function escapeXml(value: string): string {
	return value
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
		.replace(/"/g, "&quot;")
		.replace(/'/g, "&apos;");
}

/**
 * Produces the SVG markup for a bar chart. The tallest bar is highlighted;
 * zero bars are drawn without a value label.
 */
export function buildBarChartSvg(series: ChartSeries): string {
	if (series.labels.length !== series.values.length) {
		throw new Error(
			`Chart series mismatch: ${series.labels.length} labels, ${series.values.length} values`,
		);
	}

	const plotWidth = CHART_WIDTH - MARGIN.left - MARGIN.right;
	const plotHeight = CHART_HEIGHT - MARGIN.top - MARGIN.bottom;
	const count = Math.max(1, series.values.length);
	const slot = plotWidth / count;
	const barWidth = slot * 0.7;
	const max = Math.max(0, ...series.values);
	const scale = max > 0 ? plotHeight / max : 0;
	const peakIndex = max > 0 ? series.values.indexOf(max) : -1;
	// Thin out x labels on long series (days of a month)
	const labelStep = Math.max(1, Math.ceil(count / 16));

	const parts: string[] = [];
	parts.push(
		`<svg xmlns="http://www.w3.org/2000/svg" width="${CHART_WIDTH}" height="${CHART_HEIGHT}" viewBox="0 0 ${CHART_WIDTH} ${CHART_HEIGHT}">`,
	);
	parts.push(
		`<rect width="100%" height="100%" fill="${COLORS.background}"/>`,
	);
	parts.push(
		`<text x="${CHART_WIDTH / 2}" y="40" font-family="sans-serif" font-size="22" font-weight="bold" text-anchor="middle" fill="${COLORS.text}">${escapeXml(series.title)}</text>`,
	);

	const baseline = MARGIN.top + plotHeight;
	for (let i = 0; i <= 4; i++) {
		const y = baseline - (plotHeight * i) / 4;
		parts.push(
			`<line x1="${MARGIN.left}" y1="${y}" x2="${CHART_WIDTH - MARGIN.right}" y2="${y}" stroke="${COLORS.grid}" stroke-dasharray="4 4"/>`,
		);
		if (max > 0) {
			parts.push(
				`<text x="${MARGIN.left - 8}" y="${y + 4}" font-family="sans-serif" font-size="12" text-anchor="end" fill="${COLORS.text}">${Math.round((max * i) / 4)}</text>`,
			);
		}
	}

	series.values.forEach((value, index) => {
		const height = value * scale;
		const x = MARGIN.left + index * slot + (slot - barWidth) / 2;
		const y = baseline - height;
		const fill = index === peakIndex ? COLORS.peak : COLORS.bar;
		parts.push(
			`<rect x="${x.toFixed(1)}" y="${y.toFixed(1)}" width="${barWidth.toFixed(1)}" height="${height.toFixed(1)}" fill="${fill}" stroke="${COLORS.barStroke}"/>`,
		);
		if (value > 0) {
			parts.push(
				`<text x="${(x + barWidth / 2).toFixed(1)}" y="${(y - 6).toFixed(1)}" font-family="sans-serif" font-size="12" text-anchor="middle" fill="${COLORS.text}">${value}</text>`,
			);
		}
		if (index % labelStep === 0) {
			parts.push(
				`<text x="${(x + barWidth / 2).toFixed(1)}" y="${baseline + 22}" font-family="sans-serif" font-size="12" text-anchor="middle" fill="${COLORS.text}">${escapeXml(series.labels[index])}</text>`,
			);
		}
	});

	parts.push("</svg>");
	return parts.join("");
}

export class SvgChartRenderer implements ChartRenderer {
	async render(series: ChartSeries): Promise<Buffer> {
		const svg = buildBarChartSvg(series);
		return sharp(Buffer.from(svg)).png().toBuffer();
	}
}
