/**
 * Appointment Workflow
 *
 * Three-phase appointment stepper:
 *
 * 1. Booking details   trucking company, terminal, move type, container id
 * 2. Container details container checkbox, optional PIN, truck plate, own chassis
 *                      (defaults to NO)
 * 3. Appointment       check mode lists the open time slots;
 *                      book mode selects a slot and submits
 *
 * Phases 1 and 2 end with the stepper's Next button and are verified through
 * the step indicator by the engine.
 */

import type { PageDriver } from '../types/page-driver.js';
import type { FieldAction, PhaseContext, PhaseSpec, WorkflowDefinition, WorkflowPayload } from '../types/workflow.js';
import { anyOfProbe, probeFirst, requireElement, selectorProbe, textSelector } from '../core/element-probes.js';
import {
  NEXT_BUTTON_PROBES,
  clickOption,
  fillAutocomplete,
  fillChipInput,
  parseYesNo,
  readAllText,
  selectDropdownOption,
  setYesNoToggle,
} from './ui-actions.js';
import { TIMEOUTS, sleep } from '../utils/timeouts.js';

export type AppointmentMode = 'check' | 'book';

export const APPOINTMENT_WORKFLOWS: Record<AppointmentMode, string> = {
  check: 'appointment_check',
  book: 'appointment_book',
};

export interface AppointmentWorkflowOptions {
  appointmentUrl: string;
  /** Wait after each click or keystroke */
  uiSettleMs?: number;
  /** Wait after loading the appointment page */
  bootSettleMs?: number;
}

const SLOT_SELECT_PROBES = [
  selectorProbe('mat-select[formcontrolname="slot"]', 'slot_control'),
  selectorProbe(
    "xpath=//mat-label[contains(text(),'Appointment') or contains(text(),'Time')]/ancestor::mat-form-field//mat-select",
    'slot_label'
  ),
  selectorProbe('mat-select', 'any_select'),
];

const SLOT_OPTION_SELECTOR = 'mat-option .mat-option-text, mat-option .mat-select-min-line';

const SUBMIT_PROBES = [
  selectorProbe(textSelector('button', 'Submit'), 'submit_text'),
  selectorProbe(textSelector('button', 'Book'), 'book_text'),
  selectorProbe('button[type="submit"]', 'submit_type'),
];

function fill(field: string, run: (ctx: PhaseContext, value: string) => Promise<void>): FieldAction {
  return {
    field,
    run: (ctx) => run(ctx, ctx.values[field] ?? ''),
  };
}

async function clickNext(ctx: PhaseContext): Promise<void> {
  const next = await requireElement(ctx.driver, NEXT_BUTTON_PROBES, 'Next button');
  await ctx.driver.click(next);
}

async function openSlotDropdown(driver: PageDriver, settleMs: number): Promise<void> {
  const dropdown = await requireElement(driver, SLOT_SELECT_PROBES, 'appointment time dropdown');
  await driver.click(dropdown);
  await sleep(settleMs);
}

async function closeOverlay(driver: PageDriver, settleMs: number): Promise<void> {
  const backdrop = await driver.find('.cdk-overlay-backdrop');
  if (backdrop) {
    await driver.click(backdrop);
    await sleep(settleMs);
  }
}

export function createAppointmentWorkflow(mode: AppointmentMode, options: AppointmentWorkflowOptions): WorkflowDefinition {
  const ui = options.uiSettleMs ?? TIMEOUTS.UI_SETTLE;

  const bookingDetails: PhaseSpec = {
    kind: 'transition',
    ordinal: 1,
    name: 'booking_details',
    requiredFields: ['trucking_company', 'terminal', 'move_type', 'container_id'],
    enter: async (ctx) => {
      await ctx.driver.navigate(options.appointmentUrl);
    },
    settleMs: options.bootSettleMs ?? TIMEOUTS.APP_BOOT,
    fills: [
      fill('trucking_company', (ctx, value) => selectDropdownOption(ctx.driver, 'Trucking', value, ui)),
      fill('terminal', (ctx, value) => selectDropdownOption(ctx.driver, 'Terminal', value, ui)),
      fill('move_type', (ctx, value) => selectDropdownOption(ctx.driver, 'Move', value, ui)),
      fill('container_id', (ctx, value) =>
        fillChipInput(
          ctx.driver,
          ['input[formcontrolname="containerNumber"]', 'input[placeholder="Container number(s)"]'],
          value,
          ui
        )
      ),
    ],
    transition: { name: 'next', run: clickNext },
  };

  const containerDetails: PhaseSpec = {
    kind: 'transition',
    ordinal: 2,
    name: 'container_details',
    requiredFields: ['truck_plate'],
    optionalFields: ['pin_code', 'own_chassis'],
    // The toggle keeps the last booking's choice unless set every time
    defaults: { own_chassis: 'no' },
    fills: [
      {
        field: 'container_checkbox',
        run: async (ctx) => {
          if (await ctx.driver.find('mat-checkbox.mat-checkbox-checked')) return;
          const box = await requireElement(
            ctx.driver,
            [anyOfProbe('checkbox', ['mat-checkbox label', 'input[type="checkbox"]'])],
            'container checkbox'
          );
          await ctx.driver.click(box);
          await sleep(ui);
        },
      },
      fill('pin_code', async (ctx, value) => {
        // Only some terminals ask for a PIN
        const hit = await probeFirst(ctx.driver, [selectorProbe('input[formcontrolname="Pin"]', 'pin')]);
        if (!hit) {
          ctx.log.debug('PIN field not present; skipping');
          return;
        }
        await ctx.driver.type(hit.ref, value);
        await sleep(ui);
      }),
      fill('truck_plate', async (ctx, value) => {
        const input = await requireElement(
          ctx.driver,
          [selectorProbe('input[formcontrolname="Plate"]', 'plate')],
          'truck plate input'
        );
        await fillAutocomplete(ctx.driver, input, value, ui);
      }),
      fill('own_chassis', (ctx, value) => setYesNoToggle(ctx.driver, parseYesNo(value), ui)),
    ],
    transition: { name: 'next', run: clickNext },
  };

  const appointment: PhaseSpec =
    mode === 'check'
      ? {
          kind: 'terminal',
          ordinal: 3,
          name: 'available_times',
          requiredFields: [],
          fills: [],
          collect: async (ctx): Promise<WorkflowPayload> => {
            await openSlotDropdown(ctx.driver, ui);
            const availableTimes = await readAllText(ctx.driver, SLOT_OPTION_SELECTOR);
            await closeOverlay(ctx.driver, ui);
            ctx.log.info('Appointment times read', { count: availableTimes.length });
            return { availableTimes, count: availableTimes.length };
          },
        }
      : {
          kind: 'terminal',
          ordinal: 3,
          name: 'submit_appointment',
          requiredFields: ['appointment_time'],
          fills: [
            fill('appointment_time', async (ctx, value) => {
              await openSlotDropdown(ctx.driver, ui);
              await clickOption(ctx.driver, value, ui);
            }),
          ],
          collect: async (ctx): Promise<WorkflowPayload> => {
            const submit = await requireElement(ctx.driver, SUBMIT_PROBES, 'submit button');
            await ctx.driver.click(submit);
            await sleep(ui);
            return { submitted: true, appointmentTime: ctx.values.appointment_time };
          },
        };

  return {
    name: APPOINTMENT_WORKFLOWS[mode],
    phases: [bookingDetails, containerDetails, appointment],
  };
}
