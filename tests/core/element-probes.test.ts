import { describe, it, expect } from 'vitest';
import {
  anyOfProbe,
  probeFirst,
  requireElement,
  selectorProbe,
  textSelector,
  xpathLiteral,
} from '../../src/core/element-probes.js';
import { FakePageDriver } from '../helpers/fake-driver.js';

describe('element probes', () => {
  describe('probeFirst', () => {
    it('should return the first probe that matches', async () => {
      const driver = new FakePageDriver().set('#fallback', {}).set('#primary', {});

      const hit = await probeFirst(driver, [selectorProbe('#primary', 'primary'), selectorProbe('#fallback', 'fallback')]);

      expect(hit).toEqual({ ref: { selector: '#primary', nth: 0 }, probe: 'primary' });
    });

    it('should fall through to later probes', async () => {
      const driver = new FakePageDriver().set('#fallback', {});

      const hit = await probeFirst(driver, [selectorProbe('#primary'), selectorProbe('#fallback')]);

      expect(hit?.probe).toBe('#fallback');
    });

    it('should return null when nothing matches', async () => {
      expect(await probeFirst(new FakePageDriver(), [selectorProbe('#primary')])).toBeNull();
    });

    it('should skip invisible matches', async () => {
      const driver = new FakePageDriver().set('.row', { visible: false }, { text: 'second' });

      const hit = await probeFirst(driver, [selectorProbe('.row')]);

      expect(hit?.ref).toEqual({ selector: '.row', nth: 1 });
    });
  });

  describe('anyOfProbe', () => {
    it('should try its selectors in order', async () => {
      const driver = new FakePageDriver().set('input[name="username"]', {});

      const ref = await anyOfProbe('username', ['input[name="Username"]', 'input[name="username"]']).locate(driver);

      expect(ref).toEqual({ selector: 'input[name="username"]', nth: 0 });
    });
  });

  describe('requireElement', () => {
    it('should name every probe it tried when nothing matches', async () => {
      await expect(
        requireElement(new FakePageDriver(), [selectorProbe('#a', 'a'), selectorProbe('#b', 'b')], 'Next button')
      ).rejects.toThrow('Element not found: Next button (tried a, b)');
    });
  });

  describe('xpathLiteral', () => {
    it('should quote plain text with single quotes', () => {
      expect(xpathLiteral('Next')).toBe("'Next'");
    });

    it('should switch to double quotes around an apostrophe', () => {
      expect(xpathLiteral("O'Neil")).toBe('"O\'Neil"');
    });

    it('should concat when both quote kinds appear', () => {
      expect(xpathLiteral(`a'b"c`)).toBe(`concat('a', "'", 'b"c')`);
    });
  });

  it('textSelector should build a contains() xpath', () => {
    expect(textSelector('button', 'Next')).toBe("xpath=//button[contains(normalize-space(.), 'Next')]");
  });
});
