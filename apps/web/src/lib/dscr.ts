export type DscrTone = 'strong' | 'solid' | 'marginal' | 'weak' | 'none';

export interface DscrGrade {
  grade: string;
  tone: DscrTone;
}

const GRADES: ReadonlyArray<[min: number, grade: string, tone: DscrTone]> = [
  [2.0, 'A+', 'strong'],
  [1.8, 'A', 'strong'],
  [1.6, 'A-', 'strong'],
  [1.4, 'B+', 'solid'],
  [1.2, 'B', 'solid'],
  [1.0, 'B-', 'solid'],
  [0.9, 'C+', 'marginal'],
  [0.8, 'C', 'marginal'],
  [0.7, 'C-', 'marginal'],
  [0.6, 'D+', 'weak'],
  [0.5, 'D', 'weak']
];

export function gradeDscr(dscr: number | undefined): DscrGrade {
  if (typeof dscr !== 'number' || !Number.isFinite(dscr) || dscr <= 0) return { grade: 'N/A', tone: 'none' };

  for (const [min, grade, tone] of GRADES) {
    if (dscr >= min) return { grade, tone };
  }
  return { grade: 'D-', tone: 'weak' };
}

export function formatCurrency(value: number | undefined, fractionDigits = 0): string {
  if (typeof value !== 'number' || Number.isNaN(value)) return 'Data not available';
  return new Intl.NumberFormat('en-US', {
    style: 'currency',
    currency: 'USD',
    minimumFractionDigits: fractionDigits,
    maximumFractionDigits: fractionDigits
  }).format(value);
}

export function formatNumber(value: number | undefined): string {
  if (typeof value !== 'number' || Number.isNaN(value)) return 'Data not available';
  return new Intl.NumberFormat('en-US').format(value);
}

export function averageRent(rents: ReadonlyArray<number | undefined>): number | undefined {
  const known = rents.filter((r): r is number => typeof r === 'number' && r > 0);
  if (known.length === 0) return undefined;
  return known.reduce((sum, r) => sum + r, 0) / known.length;
}
