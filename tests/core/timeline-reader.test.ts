import { describe, it, expect } from 'vitest';
import { extractDate, readTimeline, timelineScript, toMarkers, visualStateOf } from '../../src/core/timeline-reader.js';
import { FakePageDriver } from '../helpers/fake-driver.js';

describe('timeline reader', () => {
  describe('visualStateOf', () => {
    it('should recognise reached markers', () => {
      expect(visualStateOf('timeline-item step-completed')).toBe('reached');
    });

    it('should not mistake inactive for active', () => {
      expect(visualStateOf('timeline-item inactive')).toBe('neutral');
    });

    it('should return unknown when no rule matches', () => {
      expect(visualStateOf('timeline-item')).toBe('unknown');
    });

    it('should not read incomplete as complete', () => {
      expect(visualStateOf('timeline-item incomplete')).toBe('neutral');
    });

    it('should treat a negated state word as neutral', () => {
      expect(visualStateOf('timeline-item not-completed')).toBe('neutral');
    });

    it('should let a reached class win over a grey styling class', () => {
      expect(visualStateOf('timeline-item completed timeline-date text-gray')).toBe('reached');
    });

    it('should read state words inside compound class names', () => {
      expect(visualStateOf('mat-step-icon mat-step-icon-state-done')).toBe('reached');
      expect(visualStateOf('mat-step-icon mat-step-icon-state-number')).toBe('unknown');
    });
  });

  describe('extractDate', () => {
    it('should pull a date and time out of marker text', () => {
      expect(extractDate('Pregate\n03/14/2025 10:42 AM')).toBe('03/14/2025 10:42 AM');
    });

    it('should return undefined for N/A', () => {
      expect(extractDate('Pregate\nN/A')).toBeUndefined();
    });
  });

  describe('timelineScript', () => {
    it('should read classes from the marker and its state element only', () => {
      const script = timelineScript({ item: '.timeline-item', state: '.timeline-icon' });

      expect(script).toContain('const stateSelector = ".timeline-icon";');
      expect(script).not.toContain("querySelectorAll('[class]')");
    });
  });

  describe('toMarkers', () => {
    it('should use the label element text when present and the first line otherwise', () => {
      const result = toMarkers([
        { classes: 'timeline-item completed', text: 'Discharged\n03/01/2025', name: null },
        { classes: 'timeline-item pending', text: 'ignored', name: 'Pregate' },
      ]);

      expect(result).toEqual([
        { index: 0, visualState: 'reached', name: 'Discharged', date: '03/01/2025' },
        { index: 1, visualState: 'neutral', name: 'Pregate' },
      ]);
    });
  });

  describe('readTimeline', () => {
    it('should validate the script output and map it to markers', async () => {
      const driver = new FakePageDriver();
      driver.scriptHandler = () => [{ classes: 'done', text: 'Gate out\n03/05/2025', name: null }];

      const result = await readTimeline(driver, { item: '.timeline-item' });

      expect(result).toEqual([{ index: 0, visualState: 'reached', name: 'Gate out', date: '03/05/2025' }]);
      expect(driver.scripts).toEqual([timelineScript({ item: '.timeline-item' })]);
    });

    it('should reject output of the wrong shape', async () => {
      const driver = new FakePageDriver();
      driver.scriptHandler = () => [{ classes: 42 }];

      await expect(readTimeline(driver, { item: '.timeline-item' })).rejects.toThrow(
        /^Timeline script returned unexpected data/
      );
    });
  });
});
