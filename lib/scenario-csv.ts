import Papa from 'papaparse';
import { ValidationError, type ValidationIssue } from '@/lib/errors';
import { pitScenarioSchema, toValidationIssues } from '@/lib/validators';
import type { PitScenario } from '@/types/strategy';

type CsvRow = Record<string, string | undefined>;

const COLUMN_PATTERNS = {
  name: ['name', 'scenario', 'label', 'strategy'],
  pitLap: ['pit_lap', 'pitLap', 'pit lap', 'lap'],
  newCompound: ['new_compound', 'newCompound', 'compound', 'tyre', 'tire'],
  weatherChangeLap: ['weather_change_lap', 'weatherChangeLap', 'weather_lap'],
  weatherChangeCondition: ['weather_change_condition', 'weatherChangeCondition', 'weather_condition', 'weather'],
  safetyCarProbability: ['safety_car_probability', 'safetyCarProbability', 'sc_probability', 'safety_car'],
} as const;

type ColumnKey = keyof typeof COLUMN_PATTERNS;
type ColumnMap = Record<ColumnKey, string | null>;

function normalizeHeader(header: string): string {
  return header.toLowerCase().replace(/[\s_-]+/g, '');
}

/** Exact match first, then case- and separator-insensitive. */
function findColumn(headers: string[], patterns: readonly string[], taken: Set<string>): string | null {
  for (const pattern of patterns) {
    const exact = headers.find((h) => h === pattern && !taken.has(h));
    if (exact) return exact;
  }

  for (const pattern of patterns) {
    const loose = headers.find(
      (h) => normalizeHeader(h) === normalizeHeader(pattern) && !taken.has(h)
    );
    if (loose) return loose;
  }

  return null;
}

export function mapScenarioColumns(headers: string[]): ColumnMap {
  const taken = new Set<string>();
  const map: ColumnMap = {
    name: null,
    pitLap: null,
    newCompound: null,
    weatherChangeLap: null,
    weatherChangeCondition: null,
    safetyCarProbability: null,
  };

  // Longer, more specific names claim their columns before the generic ones ('lap', 'weather').
  const order: ColumnKey[] = [
    'weatherChangeLap',
    'weatherChangeCondition',
    'safetyCarProbability',
    'pitLap',
    'newCompound',
    'name',
  ];

  for (const key of order) {
    const column = findColumn(headers, COLUMN_PATTERNS[key], taken);
    if (column) {
      taken.add(column);
    }
    map[key] = column;
  }

  return map;
}

function cell(row: CsvRow, column: string | null): string | undefined {
  if (!column) return undefined;
  const value = row[column]?.trim();
  return value ? value : undefined;
}

function numeric(value: string | undefined): number | string | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? value : parsed;
}

function rowToCandidate(row: CsvRow, columns: ColumnMap): Record<string, unknown> {
  const weatherLap = numeric(cell(row, columns.weatherChangeLap));
  const weatherCondition = cell(row, columns.weatherChangeCondition)?.toLowerCase();

  return {
    name: cell(row, columns.name),
    pitLap: numeric(cell(row, columns.pitLap)),
    newCompound: cell(row, columns.newCompound)?.toLowerCase(),
    weatherChange:
      weatherLap !== undefined || weatherCondition !== undefined
        ? { lap: weatherLap, condition: weatherCondition }
        : undefined,
    safetyCarProbability: numeric(cell(row, columns.safetyCarProbability)),
  };
}

export function parseScenarioCsv(content: string): PitScenario[] {
  const parseResult = Papa.parse<CsvRow>(content, {
    header: true,
    skipEmptyLines: 'greedy',
    transformHeader: (header) => header.trim(),
  });

  if (parseResult.errors.length > 0) {
    console.warn('Scenario CSV parsing warnings:', parseResult.errors);
  }

  const headers = parseResult.meta.fields ?? [];
  const columns = mapScenarioColumns(headers);

  if (!columns.pitLap) {
    throw new ValidationError('Scenario CSV has no pit lap column', [
      { path: 'header', message: `Expected one of: ${COLUMN_PATTERNS.pitLap.join(', ')}` },
    ]);
  }

  const scenarios: PitScenario[] = [];
  const issues: ValidationIssue[] = [];

  parseResult.data.forEach((row, index) => {
    const parsed = pitScenarioSchema.safeParse(rowToCandidate(row, columns));
    const rowNumber = index + 1;

    if (!parsed.success) {
      for (const issue of toValidationIssues(parsed.error)) {
        issues.push({
          path: issue.path ? `row ${rowNumber}.${issue.path}` : `row ${rowNumber}`,
          message: issue.message,
        });
      }
      return;
    }

    scenarios.push({ ...parsed.data, name: parsed.data.name ?? `Scenario ${rowNumber}` });
  });

  if (issues.length > 0) {
    throw new ValidationError('Invalid scenarios in CSV', issues);
  }

  return scenarios;
}
