/**
 * Validation Utilities
 * 
 * Functions for validating external inputs to prevent invalid data
 * from propagating through the system.
 */

import { ValidationError } from '../errors/index.js';

export { ValidationError };

/**
 * Validates a date string in ISO format (YYYY-MM-DD)
 * 
 * @param dateISO - Date string to validate
 * @returns True if valid, false otherwise
 */
export function isValidDateISO(dateISO: string): boolean {
  const regex = /^\d{4}-\d{2}-\d{2}$/;
  if (!regex.test(dateISO)) {
    return false;
  }
  
  const [year, month, day] = dateISO.split('-').map(Number);
  
  // JavaScript Date is lenient ('2025-02-30' rolls over to March), so compare components
  const date = new Date(year, month - 1, day);
  return (
    !isNaN(date.getTime()) &&
    date.getFullYear() === year &&
    date.getMonth() === month - 1 &&
    date.getDate() === day
  );
}

/**
 * Validates a season label such as "2022-23"
 * 
 * The second part must be the two-digit year following the first.
 */
export function isValidSeasonLabel(label: string): boolean {
  const m = /^(\d{4})-(\d{2})$/.exec(label);
  if (!m) return false;
  const start = Number(m[1]);
  return (start + 1) % 100 === Number(m[2]);
}

/**
 * Throws ValidationError unless the label is a well-formed season
 */
export function assertSeasonLabel(label: string): string {
  const trimmed = label.trim();
  if (!isValidSeasonLabel(trimmed)) {
    throw new ValidationError(`Invalid season label: "${label}". Expected e.g. 2022-23`, 'season');
  }
  return trimmed;
}

/**
 * Validates a source game identifier (e.g. "202210180BOS")
 */
export function isValidGameId(gameId: string): boolean {
  return /^\d{9}[A-Z]{3}$/.test(gameId);
}

/**
 * Validates a URL string
 * 
 * @param url - URL to validate
 * @returns True if valid URL, false otherwise
 */
export function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}
