import { clamp } from '../core/grid';
import { MAX_FLOW_RATE_SETTING, MIN_FLOW_RATE_SETTING } from '../core/physics';
import {
  EVAPORATION_PRESETS,
  INFILTRATION_PRESETS,
  RAIN_PRESETS,
  WEATHER_PRESETS
} from '../core/presets';
import type { RatePreset, WeatherPreset } from '../core/presets';
import type { WaterRates } from '../core/types';
import type { CellWaterDiagnostics } from '../core/water';

export const MAX_RAIN_MM_HR = 100;
export const MAX_EVAPORATION_MM_HR = 50;
export const MAX_INFILTRATION_MM_HR = 100;

/** The part of the coordinator the panel drives. */
export interface WaterControls {
  isAvailable(): boolean;
  isRunning(): boolean;
  isRaining(): boolean;
  getRates(): Readonly<WaterRates>;
  start(): void;
  stop(): void;
  startRain(): void;
  stopRain(): void;
  reset(): void;
  setRainRate(mmPerHour: number): void;
  setEvaporationRate(mmPerHour: number): void;
  setInfiltrationRate(mmPerHour: number): void;
  setFlowRate(rate: number): void;
  applyPreset(preset: WeatherPreset): void;
}

interface RateRow {
  input: HTMLInputElement;
  value: HTMLSpanElement;
  buttons: HTMLButtonElement[];
}

function readNumber(input: HTMLInputElement, min: number, max: number): number {
  const value = Number(input.value);
  if (!Number.isFinite(value)) {
    return min;
  }

  return clamp(value, min, max);
}

function formatMmPerHour(value: number): string {
  return `${value.toFixed(1)} mm/h`;
}

export class WaterPanel {
  readonly element: HTMLDivElement;

  private readonly controls: WaterControls;
  private readonly flowButton: HTMLButtonElement;
  private readonly rainButton: HTMLButtonElement;
  private readonly resetButton: HTMLButtonElement;
  private readonly rainRow: RateRow;
  private readonly evaporationRow: RateRow;
  private readonly infiltrationRow: RateRow;
  private readonly flowInput: HTMLInputElement;
  private readonly flowValue: HTMLSpanElement;
  private readonly weatherButtons: HTMLButtonElement[] = [];
  private readonly status: HTMLParagraphElement;
  private readonly cellReadout: HTMLParagraphElement;

  constructor(host: HTMLElement, controls: WaterControls) {
    this.controls = controls;

    this.element = document.createElement('div');
    this.element.className = 'water-panel';

    const title = document.createElement('h2');
    title.textContent = 'Water';
    this.element.appendChild(title);

    const actions = document.createElement('div');
    actions.className = 'water-actions';

    this.flowButton = this.createButton('water-flow-toggle', () => {
      if (this.controls.isRunning()) {
        this.controls.stop();
      } else {
        this.controls.start();
      }
    });
    this.rainButton = this.createButton('water-rain-toggle', () => {
      if (this.controls.isRaining()) {
        this.controls.stopRain();
      } else {
        this.controls.startRain();
      }
    });
    this.resetButton = this.createButton('water-reset', () => this.controls.reset());
    this.resetButton.textContent = 'Clear Water';

    actions.appendChild(this.flowButton);
    actions.appendChild(this.rainButton);
    actions.appendChild(this.resetButton);
    this.element.appendChild(actions);

    this.rainRow = this.createRateRow('Rain', 'water-rain-rate', MAX_RAIN_MM_HR, RAIN_PRESETS, (v) =>
      this.controls.setRainRate(v)
    );
    this.evaporationRow = this.createRateRow(
      'Evaporation',
      'water-evaporation-rate',
      MAX_EVAPORATION_MM_HR,
      EVAPORATION_PRESETS,
      (v) => this.controls.setEvaporationRate(v)
    );
    this.infiltrationRow = this.createRateRow(
      'Infiltration',
      'water-infiltration-rate',
      MAX_INFILTRATION_MM_HR,
      INFILTRATION_PRESETS,
      (v) => this.controls.setInfiltrationRate(v)
    );

    this.flowInput = document.createElement('input');
    this.flowInput.type = 'range';
    this.flowInput.min = String(MIN_FLOW_RATE_SETTING);
    this.flowInput.max = String(MAX_FLOW_RATE_SETTING);
    this.flowInput.step = '0.01';
    this.flowInput.dataset.testid = 'water-flow-rate';
    this.flowValue = document.createElement('span');
    this.flowInput.addEventListener('input', () => {
      this.controls.setFlowRate(
        readNumber(this.flowInput, MIN_FLOW_RATE_SETTING, MAX_FLOW_RATE_SETTING)
      );
      this.refresh();
    });
    this.element.appendChild(this.createControlRow('Flow', this.flowInput, this.flowValue));

    const presets = document.createElement('div');
    presets.className = 'water-presets';
    for (const preset of WEATHER_PRESETS) {
      const button = this.createButton(`water-preset-${preset.label}`, () =>
        this.controls.applyPreset(preset)
      );
      button.textContent = preset.label;
      this.weatherButtons.push(button);
      presets.appendChild(button);
    }
    this.element.appendChild(presets);

    this.status = document.createElement('p');
    this.status.className = 'water-status';
    this.element.appendChild(this.status);

    this.cellReadout = document.createElement('p');
    this.cellReadout.className = 'water-cell';
    this.cellReadout.dataset.testid = 'water-cell';
    this.element.appendChild(this.cellReadout);

    host.appendChild(this.element);
    this.refresh();
  }

  /** Syncs every control with the coordinator's current state. */
  refresh(): void {
    const available = this.controls.isAvailable();
    const running = this.controls.isRunning();
    const raining = this.controls.isRaining();
    const rates = this.controls.getRates();

    this.flowButton.textContent = running ? 'Stop Flow' : 'Start Flow';
    this.rainButton.textContent = raining ? 'Stop Rain' : 'Start Rain';

    this.syncRateRow(this.rainRow, rates.rainRateMmHr);
    this.syncRateRow(this.evaporationRow, rates.evaporationMmHr);
    this.syncRateRow(this.infiltrationRow, rates.infiltrationMmHr);
    this.flowInput.value = rates.flowRate.toFixed(2);
    this.flowValue.textContent = rates.flowRate.toFixed(2);

    const controls: Array<HTMLButtonElement | HTMLInputElement> = [
      this.flowButton,
      this.rainButton,
      this.resetButton,
      this.flowInput,
      ...this.weatherButtons
    ];
    for (const row of [this.rainRow, this.evaporationRow, this.infiltrationRow]) {
      controls.push(row.input, ...row.buttons);
    }
    for (const control of controls) {
      control.disabled = !available;
    }

    if (!available) {
      this.status.textContent = 'Water simulation is unavailable in this browser.';
    } else if (raining) {
      this.status.textContent = 'Raining';
    } else if (running) {
      this.status.textContent = 'Draining';
    } else {
      this.status.textContent = 'Stopped';
    }
  }

  /** Hover readout for a single cell; null clears it. */
  showCell(cell: CellWaterDiagnostics | null): void {
    if (!cell) {
      this.cellReadout.textContent = '';
      return;
    }

    const label = `Cell ${cell.x}, ${cell.y}`;
    if (!cell.hasElevation) {
      this.cellReadout.textContent = `${label}: no elevation data`;
      return;
    }

    const depth = `${(cell.waterHeight * 1000).toFixed(1)} mm`;
    const outflow = `${Math.round(cell.outflowRate * 100)}% out per step`;
    const drain = cell.edgeDrainDiff > 0 ? ', draining off the edge' : '';
    this.cellReadout.textContent = `${label}: ${depth}, ${outflow}${drain}`;
  }

  private syncRateRow(row: RateRow, value: number): void {
    row.input.value = value.toFixed(1);
    row.value.textContent = formatMmPerHour(value);
  }

  private createButton(testId: string, onClick: () => void): HTMLButtonElement {
    const button = document.createElement('button');
    button.type = 'button';
    button.dataset.testid = testId;
    button.addEventListener('click', () => {
      onClick();
      this.refresh();
    });
    return button;
  }

  private createRateRow(
    labelText: string,
    testId: string,
    max: number,
    presets: readonly RatePreset[],
    apply: (mmPerHour: number) => void
  ): RateRow {
    const input = document.createElement('input');
    input.type = 'range';
    input.min = '0';
    input.max = String(max);
    input.step = '0.5';
    input.dataset.testid = testId;

    const value = document.createElement('span');
    input.addEventListener('input', () => {
      apply(readNumber(input, 0, max));
      this.refresh();
    });
    this.element.appendChild(this.createControlRow(labelText, input, value));

    const group = document.createElement('div');
    group.className = 'water-rate-presets';
    const buttons = presets.map((preset) => {
      const button = this.createButton(`${testId}-${preset.label}`, () => apply(preset.value));
      button.textContent = preset.label;
      group.appendChild(button);
      return button;
    });
    this.element.appendChild(group);

    return { input, value, buttons };
  }

  private createControlRow(
    labelText: string,
    input: HTMLInputElement,
    value: HTMLSpanElement
  ): HTMLLabelElement {
    const row = document.createElement('label');
    row.className = 'control-row';

    const label = document.createElement('span');
    label.className = 'control-label';
    label.textContent = labelText;

    value.className = 'control-value';

    row.appendChild(label);
    row.appendChild(input);
    row.appendChild(value);
    return row;
  }
}
