import { describe, it, expect } from 'vitest';
import { fillChipInput, parseYesNo, readAllText, setYesNoToggle } from '../../src/workflows/ui-actions.js';
import { xpathLiteral } from '../../src/core/element-probes.js';
import { FakePageDriver } from '../helpers/fake-driver.js';

const CHIP_REMOVE = 'mat-icon[matchipremove]';

function toggle(label: string): string {
  return `xpath=//mat-button-toggle[.//span[normalize-space(text())=${xpathLiteral(label)}]]`;
}

describe('ui actions', () => {
  describe('fillChipInput', () => {
    it('should remove existing chips before typing the new value', async () => {
      let chips = 2;
      const driver = new FakePageDriver().set(CHIP_REMOVE, {}).set('#chips', {}).set('body', {});
      driver.onClick(CHIP_REMOVE, () => {
        chips -= 1;
        if (chips === 0) driver.remove(CHIP_REMOVE);
      });

      await fillChipInput(driver, ['#missing', '#chips'], 'TEST1234567', 0);

      expect(driver.clicks.map(ref => ref.selector)).toEqual([CHIP_REMOVE, CHIP_REMOVE, 'body']);
      expect(driver.typed).toEqual([{ selector: '#chips', text: 'TEST1234567' }]);
    });

    it('should fail when no chip input is rendered', async () => {
      await expect(fillChipInput(new FakePageDriver(), ['#chips'], 'x', 0)).rejects.toThrow(
        'Element not found: chip input (tried chip_input)'
      );
    });
  });

  describe('setYesNoToggle', () => {
    it('should leave an already checked toggle alone', async () => {
      const driver = new FakePageDriver().set(toggle('YES'), { attributes: { class: 'mat-button-toggle-checked' } });

      await setYesNoToggle(driver, true, 0);

      expect(driver.clicks).toEqual([]);
    });

    it('should click the inner button of an unchecked toggle', async () => {
      const driver = new FakePageDriver().set(toggle('NO'), { attributes: { 'aria-pressed': 'false' } });
      driver.set(`${toggle('NO')}//button`, {});

      await setYesNoToggle(driver, false, 0);

      expect(driver.clicks).toEqual([{ selector: `${toggle('NO')}//button`, nth: 0 }]);
    });
  });

  it('parseYesNo should accept the usual truthy spellings', () => {
    expect(['Yes', 'y', 'TRUE', '1'].map(parseYesNo)).toEqual([true, true, true, true]);
    expect(['no', '', 'maybe'].map(parseYesNo)).toEqual([false, false, false]);
  });

  it('readAllText should drop blank entries', async () => {
    const driver = new FakePageDriver().set('li', { text: ' 08:00 ' }, { text: '  ' }, { text: '09:00' });

    expect(await readAllText(driver, 'li')).toEqual(['08:00', '09:00']);
  });
});
