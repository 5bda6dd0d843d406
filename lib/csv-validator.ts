// CSV Validation and Parsing
// Email traffic format: sender, recipient, optional count, optional timestamp

import type { EmailRecord } from './types';

const REQUIRED_COLUMNS = ['sender', 'recipient'];
const COUNT_COLUMNS = ['count', 'frequency', 'number', 'weight'];
const MAX_ERRORS = 10;
const LARGE_DATASET = 50000;

export interface ValidationResult {
  success: boolean;
  records: EmailRecord[];
  errors: string[];
  warnings: string[];
}

export function validateAndParseCSV(content: string): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const records: EmailRecord[] = [];

  // Check for empty file
  const trimmed = content.trim();
  if (!trimmed) {
    return { success: false, records: [], errors: ['File is empty'], warnings: [] };
  }

  const lines = trimmed.split(/\r?\n/);
  if (lines.length < 2) {
    return {
      success: false,
      records: [],
      errors: ['File must have a header row and at least one data row'],
      warnings: [],
    };
  }

  // Parse header
  const headers = lines[0].split(',').map((h) => h.trim().toLowerCase());

  const missingColumns = REQUIRED_COLUMNS.filter((col) => !headers.includes(col));
  if (missingColumns.length > 0) {
    return {
      success: false,
      records: [],
      errors: [`Missing required columns: ${missingColumns.join(', ')}. Required: ${REQUIRED_COLUMNS.join(', ')}`],
      warnings: [],
    };
  }

  const colIdx = {
    sender: headers.indexOf('sender'),
    recipient: headers.indexOf('recipient'),
    count: headers.findIndex((h) => COUNT_COLUMNS.includes(h)),
    timestamp: headers.indexOf('timestamp'),
  };

  for (let i = 1; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue; // Skip blank lines

    const values = line.split(',').map((v) => v.trim());
    const lineNum = i + 1;

    if (values.length < headers.length) {
      errors.push(`Row ${lineNum}: Expected ${headers.length} columns but got ${values.length}`);
      continue;
    }

    const sender = values[colIdx.sender];
    const recipient = values[colIdx.recipient];

    if (!sender) {
      errors.push(`Row ${lineNum}: Missing sender`);
      continue;
    }
    if (!recipient) {
      errors.push(`Row ${lineNum}: Missing recipient`);
      continue;
    }
    if (sender === recipient) {
      warnings.push(`Row ${lineNum}: Self-addressed email from ${sender}`);
    }

    const record: EmailRecord = { sender, recipient, weight: 1 };

    const countStr = colIdx.count >= 0 ? values[colIdx.count] : '';
    if (countStr) {
      const count = Number(countStr);
      if (!Number.isInteger(count) || count <= 0) {
        errors.push(`Row ${lineNum}: Invalid count "${countStr}" - must be a positive integer`);
        continue;
      }
      record.weight = count;
    }

    const timestamp = colIdx.timestamp >= 0 ? values[colIdx.timestamp] : '';
    if (timestamp) {
      if (Number.isNaN(Date.parse(timestamp))) {
        errors.push(`Row ${lineNum}: Invalid timestamp "${timestamp}"`);
        continue;
      }
      record.timestamp = timestamp;
    }

    records.push(record);
  }

  if (records.length > LARGE_DATASET) {
    warnings.push(`Large dataset: ${records.length} records. Processing may take longer.`);
  }

  if (errors.length > MAX_ERRORS) {
    return {
      success: false,
      records: [],
      errors: [`Too many errors (${errors.length}). First ${MAX_ERRORS}:`, ...errors.slice(0, MAX_ERRORS)],
      warnings,
    };
  }

  return {
    success: errors.length === 0,
    records,
    errors,
    warnings,
  };
}

/** Totals over parsed records. */
export function recordStatistics(records: readonly EmailRecord[]): {
  totalRecords: number;
  uniqueSenders: number;
  uniqueRecipients: number;
  totalEmails: number;
  averageEmailsPerRecord: number;
} {
  const senders = new Set(records.map((r) => r.sender));
  const recipients = new Set(records.map((r) => r.recipient));
  const totalEmails = records.reduce((sum, r) => sum + (r.weight ?? 1), 0);
  return {
    totalRecords: records.length,
    uniqueSenders: senders.size,
    uniqueRecipients: recipients.size,
    totalEmails,
    averageEmailsPerRecord: records.length > 0 ? totalEmails / records.length : 0,
  };
}
