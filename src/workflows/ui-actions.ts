/**
 * Angular Material interactions shared by the portal workflows
 */

import type { ElementRef, PageDriver } from '../types/page-driver.js';
import { requireElement, probeFirst, selectorProbe, textSelector, xpathLiteral, anyOfProbe } from '../core/element-probes.js';
import { sleep } from '../utils/timeouts.js';

export const NEXT_BUTTON_PROBES = [
  selectorProbe("xpath=//button[contains(@class,'text-next') and .//span[contains(text(),'Next')]]", 'text_next'),
  selectorProbe(textSelector('button', 'Next'), 'button_text'),
];

/** Upper bound on chips removed before refilling a chip list */
const MAX_CHIPS = 50;

/**
 * Open the mat-select labelled `label` and pick the option reading `optionText`
 */
export async function selectDropdownOption(
  driver: PageDriver,
  label: string,
  optionText: string,
  settleMs: number
): Promise<void> {
  const dropdown = await requireElement(
    driver,
    [
      selectorProbe(`xpath=//mat-label[contains(text(), ${xpathLiteral(label)})]/ancestor::mat-form-field//mat-select`, 'labelled_select'),
    ],
    `${label} dropdown`
  );
  await driver.click(dropdown);
  await sleep(settleMs);
  await clickOption(driver, optionText, settleMs);
}

/**
 * Click the open panel's option reading `optionText`
 */
export async function clickOption(driver: PageDriver, optionText: string, settleMs: number): Promise<void> {
  const option = await requireElement(
    driver,
    [
      selectorProbe(`xpath=//mat-option//span[normalize-space(text())=${xpathLiteral(optionText)}]`, 'exact_option'),
      selectorProbe(textSelector('mat-option', optionText), 'partial_option'),
    ],
    `option '${optionText}'`
  );
  await driver.click(option);
  await sleep(settleMs);
}

/**
 * Replace the chips of a chip-list input with a single value
 */
export async function fillChipInput(
  driver: PageDriver,
  inputSelectors: string[],
  value: string,
  settleMs: number
): Promise<void> {
  // Remove chips from an earlier attempt; the list shrinks after each click
  for (let i = 0; i < MAX_CHIPS; i++) {
    const remove = await driver.find('mat-icon[matchipremove]');
    if (!remove) break;
    await driver.click(remove);
    await sleep(settleMs);
  }

  const input = await requireElement(driver, [anyOfProbe('chip_input', inputSelectors)], 'chip input');
  await driver.type(input, value);
  await sleep(settleMs);

  // The chip list adds its pending value on blur
  const body = await driver.find('body');
  if (body) {
    await driver.click(body);
    await sleep(settleMs);
  }
}

/**
 * Type into an autocomplete and pick the exact match, or the first suggestion
 */
export async function fillAutocomplete(
  driver: PageDriver,
  input: ElementRef,
  value: string,
  settleMs: number
): Promise<void> {
  await driver.type(input, value);
  await sleep(settleMs);
  const hit = await probeFirst(driver, [
    selectorProbe(`xpath=//mat-option//span[normalize-space(text())=${xpathLiteral(value)}]`, 'exact_option'),
    selectorProbe('mat-option', 'first_option'),
  ]);
  if (hit) {
    await driver.click(hit.ref);
    await sleep(settleMs);
  }
}

/**
 * Set a YES/NO mat-button-toggle group, clicking only when it must change
 */
export async function setYesNoToggle(driver: PageDriver, wanted: boolean, settleMs: number): Promise<void> {
  const target = wanted ? 'YES' : 'NO';
  const toggle = await requireElement(
    driver,
    [selectorProbe(`xpath=//mat-button-toggle[.//span[normalize-space(text())=${xpathLiteral(target)}]]`, 'toggle')],
    `${target} toggle`
  );
  const classes = (await driver.getAttribute(toggle, 'class')) ?? '';
  const pressed = await driver.getAttribute(toggle, 'aria-pressed');
  if (classes.includes('mat-button-toggle-checked') || pressed === 'true') {
    return;
  }
  const button = (await driver.find(`${toggle.selector}//button`)) ?? toggle;
  await driver.click(button);
  await sleep(settleMs);
}

export function parseYesNo(value: string): boolean {
  return ['yes', 'true', '1', 'y'].includes(value.trim().toLowerCase());
}

/**
 * Read the text of every match, dropping empty entries
 */
export async function readAllText(driver: PageDriver, selector: string): Promise<string[]> {
  const refs = await driver.findAll(selector);
  const texts: string[] = [];
  for (const ref of refs) {
    const text = (await driver.readText(ref)).trim();
    if (text) texts.push(text);
  }
  return texts;
}
