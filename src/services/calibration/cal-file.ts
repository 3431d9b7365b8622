export const CURVES_DESCRIPTOR = "Argyll Device Calibration Curves";
export const DELTA_E_DESCRIPTOR =
  "Argyll Output Calibration Expected DE Response";

export interface CgatsTable {
  descriptor?: string;
  fields: string[];
  rows: number[][];
}

export const INK_CHANNELS = ["Cyan", "Magenta", "Yellow", "Black"] as const;
export type InkChannel = (typeof INK_CHANNELS)[number];

export interface ChannelCurve {
  inputs: number[];
  outputs: number[];
}

export type ChannelCurves = Partial<Record<InkChannel, ChannelCurve>>;

export interface CalibrationFile {
  curves: ChannelCurves;
  expectedDeltaE: ChannelCurves;
}

const CHANNEL_SUFFIX: Record<InkChannel, string> = {
  Cyan: "_C",
  Magenta: "_M",
  Yellow: "_Y",
  Black: "_K",
};

// Column order used when a table carries no usable field names.
const FALLBACK_COLUMN: Record<InkChannel, number> = {
  Cyan: 1,
  Magenta: 2,
  Yellow: 3,
  Black: 4,
};

const unquote = (value: string): string => value.trim().replace(/^"(.*)"$/, "$1");

/** Split CGATS text into its data tables. Keywords other than DESCRIPTOR are ignored. */
export const parseCgatsTables = (text: string): CgatsTable[] => {
  const tables: CgatsTable[] = [];
  let current: CgatsTable = { fields: [], rows: [] };
  let section: "header" | "format" | "data" = "header";

  text.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith("#")) {
      return;
    }

    if (section === "format") {
      if (line.startsWith("END_DATA_FORMAT")) {
        section = "header";
        return;
      }
      current.fields.push(...line.split(/\s+/));
      return;
    }

    if (section === "data") {
      if (line.startsWith("END_DATA")) {
        tables.push(current);
        current = { fields: [], rows: [] };
        section = "header";
        return;
      }
      const row = line.split(/\s+/).map(Number);
      if (row.some((value) => !Number.isFinite(value))) {
        throw new Error(`Line ${index + 1}: expected numeric data, got "${line}".`);
      }
      current.rows.push(row);
      return;
    }

    if (line.startsWith("DESCRIPTOR")) {
      current.descriptor = unquote(line.slice("DESCRIPTOR".length));
    } else if (line.startsWith("BEGIN_DATA_FORMAT")) {
      section = "format";
    } else if (line.startsWith("BEGIN_DATA")) {
      section = "data";
    }
  });

  if (section !== "header") {
    throw new Error("Unterminated CGATS data block.");
  }
  return tables;
};

const columnIndex = (fields: string[], suffix: string): number =>
  fields.findIndex((field) => field.toUpperCase().endsWith(suffix));

const extractCurves = (table: CgatsTable): ChannelCurves => {
  const namedInput = columnIndex(table.fields, "_I");
  const inputColumn = namedInput === -1 ? 0 : namedInput;
  const curves: ChannelCurves = {};

  for (const channel of INK_CHANNELS) {
    const named = columnIndex(table.fields, CHANNEL_SUFFIX[channel]);
    const column = namedInput === -1 ? FALLBACK_COLUMN[channel] : named;
    if (column === -1 || table.rows.some((row) => row.length <= column)) {
      continue;
    }
    if (table.rows.length === 0) {
      continue;
    }

    curves[channel] = {
      inputs: table.rows.map((row) => row[inputColumn]),
      outputs: table.rows.map((row) => row[column]),
    };
  }

  return curves;
};

/** Per-channel device curves and, when present, the expected delta-E response. */
export const parseCalibrationFile = (text: string): CalibrationFile => {
  const tables = parseCgatsTables(text);
  const curvesTable =
    tables.find((table) => table.descriptor === CURVES_DESCRIPTOR) ??
    tables.find((table) => table.descriptor !== DELTA_E_DESCRIPTOR);
  if (!curvesTable) {
    throw new Error("No calibration curve table found.");
  }

  const deltaETable = tables.find(
    (table) => table.descriptor === DELTA_E_DESCRIPTOR,
  );

  return {
    curves: extractCurves(curvesTable),
    expectedDeltaE: deltaETable ? extractCurves(deltaETable) : {},
  };
};
