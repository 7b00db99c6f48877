import { describe, it, expect } from 'vitest';
import { classifyEvent } from '../../src/scraper/eventTypes.js';

describe('classifyEvent', () => {
  it('should classify shots with their value', () => {
    expect(classifyEvent('J. Tatum makes 3-pt jump shot from 26 ft')).toEqual({ type: 'made_shot', subtype: '3pt' });
    expect(classifyEvent('J. Embiid misses 2-pt hook shot from 6 ft')).toEqual({ type: 'missed_shot', subtype: '2pt' });
  });

  it('should treat free throws separately from shots', () => {
    expect(classifyEvent('T. Maxey makes free throw 1 of 2')).toEqual({ type: 'free_throw', subtype: 'made' });
    expect(classifyEvent('T. Maxey misses free throw 2 of 2')).toEqual({ type: 'free_throw', subtype: 'missed' });
  });

  it('should classify rebounds by side', () => {
    expect(classifyEvent('Offensive rebound by P. Tucker')).toEqual({ type: 'rebound', subtype: 'offensive' });
    expect(classifyEvent('Defensive rebound by Team')).toEqual({ type: 'rebound', subtype: 'defensive' });
  });

  it('should classify stoppages', () => {
    expect(classifyEvent('Turnover by J. Harden (bad pass; steal by D. White)').type).toBe('turnover');
    expect(classifyEvent('Shooting foul by A. Horford (drawn by J. Embiid)').type).toBe('foul');
    expect(classifyEvent('Violation by Team (kicked ball)').type).toBe('violation');
    expect(classifyEvent('G. Williams enters the game for R. Williams').type).toBe('substitution');
    expect(classifyEvent('Boston full timeout').type).toBe('timeout');
    expect(classifyEvent('Jump ball: J. Embiid vs. A. Horford (M. Smart gains possession)').type).toBe('jump_ball');
  });

  it('should fall back to other', () => {
    expect(classifyEvent('Instant Replay (Request: Challenge)')).toEqual({ type: 'other', subtype: null });
    expect(classifyEvent(null)).toEqual({ type: 'other', subtype: null });
  });
});
