import { z } from 'zod';

import { createTrack, type Track } from '@tracksync/contracts';

import {
  FileImportError,
  ensureTitle,
  ensureTracks,
  parseInteger,
  parseMilliseconds,
  parseTrackUri,
  splitArtists,
  toNull,
} from './common';

type CsvRecord = Record<string, string | null>;

const optionalText = z
  .string()
  .nullish()
  .transform((value) => toNull(value));

const integerText = (label: string) =>
  z
    .string()
    .nullish()
    .refine((value) => value === null || value === undefined || parseInteger(value) !== null, {
      message: `${label} must be an integer`,
    });

/** One CSV row after header mapping; unknown columns are ignored. */
const csvRowSchema = z
  .object({
    title: z
      .string({ required_error: 'title is required', invalid_type_error: 'title is required' })
      .min(1, 'title is required'),
    artists: z.string().nullish(),
    primary_artist: z.string().nullish(),
    album: optionalText,
    duration_ms: integerText('duration_ms'),
    isrc: optionalText,
    position: integerText('position'),
    source_id: optionalText,
    id: optionalText,
    uri: optionalText,
    url: optionalText,
  })
  .refine((row) => Boolean(row.artists ?? row.primary_artist), {
    message: 'artists is required',
    path: ['artists'],
  });

type CsvRow = z.infer<typeof csvRowSchema>;

const REQUIRED_COLUMNS = ['title'] as const;

const sanitizeBOM = (input: string): string =>
  input.charCodeAt(0) === 0xfeff ? input.slice(1) : input;

/** RFC 4180 style: quoted fields, doubled quotes, CRLF or LF rows; blank rows dropped. */
export const parseCsvRows = (input: string): string[][] => {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;

  const pushField = () => {
    row.push(field);
    field = '';
  };
  const pushRow = () => {
    if (row.some((value) => value.trim().length > 0)) {
      rows.push(row);
    }
    row = [];
  };

  const data = sanitizeBOM(input);

  for (let i = 0; i < data.length; i += 1) {
    const char = data[i];
    if (inQuotes) {
      if (char === '"') {
        if (data[i + 1] === '"') {
          field += '"';
          i += 1;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      pushField();
    } else if (char === '\r' || char === '\n') {
      pushField();
      pushRow();
      if (char === '\r' && data[i + 1] === '\n') {
        i += 1;
      }
    } else {
      field += char;
    }
  }

  if (field.length > 0 || row.length > 0) {
    pushField();
    pushRow();
  }

  return rows;
};

const normalizeHeader = (header: string[]): string[] =>
  header.map((column) => column.trim().toLowerCase());

const buildRowRecord = (header: string[], values: string[]): CsvRecord => {
  const record: CsvRecord = {};
  header.forEach((column, index) => {
    const trimmed = (values[index] ?? '').trim();
    record[column] = trimmed.length > 0 ? trimmed : null;
  });
  return record;
};

const validateRecord = (record: CsvRecord, lineNumber: number): CsvRow => {
  const parsed = csvRowSchema.safeParse(record);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => issue.message);
    throw new FileImportError(`Invalid CSV row at line ${lineNumber}: ${issues.join('; ')}`, {
      line: lineNumber,
      errors: parsed.error.issues,
    });
  }
  return parsed.data;
};

const toTrack = (row: CsvRow, index: number): Track => {
  const artists = splitArtists(row.artists ?? row.primary_artist);
  if (artists.length === 0) {
    throw new FileImportError('CSV row is missing artist metadata');
  }
  const position = parseInteger(row.position);
  const ordinal = position !== null && position > 0 ? position : index + 1;

  return createTrack({
    id: row.id ?? null,
    sourceId: row.source_id ?? row.id ?? `row-${ordinal}`,
    title: ensureTitle(row.title),
    artists,
    durationMs: parseMilliseconds(row.duration_ms) ?? 0,
    isrc: row.isrc ? row.isrc.toUpperCase() : null,
    album: row.album,
    uri: parseTrackUri(row.uri) ?? parseTrackUri(row.url),
  });
};

/**
 * Parses a playlist CSV (header row first) into tracks in file order.
 *
 * Recognized columns: `title`, `artists` (or `primary_artist`), `album`,
 * `duration_ms`, `isrc`, `position`, `source_id`, `id`, `uri`, `url`.
 */
export const parseCsvTracks = (csv: string): Track[] => {
  if (typeof csv !== 'string' || csv.trim().length === 0) {
    throw new FileImportError('CSV payload is empty');
  }

  const [headerRow, ...dataRows] = parseCsvRows(csv);
  if (!headerRow) {
    throw new FileImportError('CSV payload did not contain data');
  }

  const header = normalizeHeader(headerRow);
  const missing = REQUIRED_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length > 0 || !(header.includes('artists') || header.includes('primary_artist'))) {
    throw new FileImportError('CSV header is invalid: title and artists columns are required', { header });
  }

  const tracks = dataRows.map((values, index) => {
    // header is line 1
    const row = validateRecord(buildRowRecord(header, values), index + 2);
    return toTrack(row, index);
  });

  return ensureTracks(tracks, 'CSV playlist');
};
