/**
 * Event Classification
 * 
 * The HTML source has no event codes, only prose. Type and subtype are
 * recovered from the wording of the description.
 */

import type { EventType } from '../types/source.js';

export interface EventClass {
  type: EventType;
  subtype: string | null;
}

/**
 * Classifies a play description
 * 
 * @example
 * classifyEvent('J. Tatum makes 3-pt jump shot from 26 ft') // { type: 'made_shot', subtype: '3pt' }
 * classifyEvent('Defensive rebound by A. Horford')          // { type: 'rebound', subtype: 'defensive' }
 */
export function classifyEvent(description: string | null): EventClass {
  if (!description) return { type: 'other', subtype: null };
  const text = description.toLowerCase();

  // Free throws read "makes free throw 1 of 2", so check them before shots
  if (text.includes('free throw')) {
    return { type: 'free_throw', subtype: text.includes('misses') ? 'missed' : 'made' };
  }
  if (text.includes(' makes ')) {
    return { type: 'made_shot', subtype: shotValue(text) };
  }
  if (text.includes(' misses ')) {
    return { type: 'missed_shot', subtype: shotValue(text) };
  }
  if (text.includes('rebound')) {
    return { type: 'rebound', subtype: text.startsWith('offensive') ? 'offensive' : 'defensive' };
  }
  if (text.startsWith('turnover')) return { type: 'turnover', subtype: null };
  if (text.includes('foul')) return { type: 'foul', subtype: null };
  if (text.startsWith('violation')) return { type: 'violation', subtype: null };
  if (text.includes('enters the game')) return { type: 'substitution', subtype: null };
  if (text.includes('timeout')) return { type: 'timeout', subtype: null };
  if (text.startsWith('jump ball')) return { type: 'jump_ball', subtype: null };
  return { type: 'other', subtype: null };
}

function shotValue(text: string): string | null {
  if (text.includes('3-pt')) return '3pt';
  if (text.includes('2-pt')) return '2pt';
  return null;
}
