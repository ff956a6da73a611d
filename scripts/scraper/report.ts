import type { PropertyRecord, StoreStats } from './types';
import { score } from './validation';

export type RunReport = {
  total: number;
  averageCompleteness: number | null;
  validCount: number;
  priceUf: { min: number; max: number; average: number } | null;
  areaM2: { min: number; max: number; average: number } | null;
  bedroomDistribution: Record<number, number>;
};

const range = (values: number[]) =>
  values.length
    ? {
        min: Math.min(...values),
        max: Math.max(...values),
        average: values.reduce((a, b) => a + b, 0) / values.length,
      }
    : null;

const positive = (values: Array<number | null>): number[] => values.filter((v): v is number => v !== null && v > 0);

export function summarizeRecords(records: readonly PropertyRecord[]): RunReport {
  const validations = records.map(score);
  const bedroomDistribution: Record<number, number> = {};
  for (const r of records) {
    if (r.bedrooms) bedroomDistribution[r.bedrooms] = (bedroomDistribution[r.bedrooms] ?? 0) + 1;
  }
  return {
    total: records.length,
    averageCompleteness: validations.length
      ? validations.reduce((sum, v) => sum + v.completenessPercentage, 0) / validations.length
      : null,
    validCount: validations.filter((v) => v.isValid).length,
    priceUf: range(positive(records.map((r) => r.priceUf))),
    areaM2: range(positive(records.map((r) => r.totalAreaM2))),
    bedroomDistribution,
  };
}

const int = (n: number) => Math.round(n).toLocaleString('en-US');

export function formatReport(report: RunReport, stats: StoreStats | null): string[] {
  const lines = ['=== DETAILED SCRAPING SUMMARY ==='];
  if (report.total === 0) {
    lines.push('No detailed properties scraped yet.');
  } else {
    lines.push(`Total detailed properties scraped: ${report.total}`);
    if (report.averageCompleteness !== null) {
      lines.push(`Average data completeness: ${report.averageCompleteness.toFixed(1)}%`);
    }
    lines.push(
      `Valid properties (>=50% complete): ${report.validCount}/${report.total} (${((report.validCount / report.total) * 100).toFixed(1)}%)`
    );
    if (report.priceUf) {
      lines.push(`Price range (UF): ${int(report.priceUf.min)} - ${int(report.priceUf.max)}`);
      lines.push(`Average price (UF): ${int(report.priceUf.average)}`);
    }
    if (report.areaM2) {
      lines.push(`Area range (m²): ${int(report.areaM2.min)} - ${int(report.areaM2.max)}`);
      lines.push(`Average area (m²): ${int(report.areaM2.average)}`);
    }
    if (Object.keys(report.bedroomDistribution).length > 0) {
      lines.push(`Bedroom distribution: ${JSON.stringify(report.bedroomDistribution)}`);
    }
  }
  if (stats) {
    lines.push('=== STORE STATISTICS ===');
    lines.push(`Total properties in store: ${stats.totalCount}`);
    lines.push(`Properties scraped in last 24h: ${stats.recentCount}`);
    if (stats.averages.priceUf !== null) lines.push(`Store average price (UF): ${int(stats.averages.priceUf)}`);
    if (stats.averages.totalAreaM2 !== null) lines.push(`Store average area (m²): ${int(stats.averages.totalAreaM2)}`);
    const { completenessRate: c } = stats;
    lines.push(
      `Completeness: price ${c.priceUf.toFixed(1)}%, bedrooms ${c.bedrooms.toFixed(1)}%, area ${c.totalAreaM2.toFixed(1)}%`
    );
  }
  return lines;
}
