/**
 * Circuit State
 *
 * Per-slot storage for a running circuit. Every net owns one slot holding a
 * value and a flag. For behavior nets the flag marks a change this cycle;
 * for event nets it marks that an event is present. Analog nets store the
 * fixed-point integer in the value cell.
 */

import type { Coords } from '../../shared/geom/index.ts';
import type { Fixed } from '../../shared/geom/index.ts';
import { fixed } from '../../shared/geom/index.ts';
import type { WireSize } from '../wires/index.ts';
import { wireMask } from '../wires/index.ts';
import type { EvalError, PortLoc } from './types.ts';

export interface SlotInfo {
  size: WireSize;
  /** True for a port with no wire fragments attached */
  isNull: boolean;
  /** The port that writes this slot, if any */
  source: PortLoc | null;
}

export class CircuitState {
  private readonly values: number[];
  private readonly flags: boolean[];
  private readonly slots: readonly SlotInfo[];
  private pendingBreakpoints: Coords[] = [];
  private pendingErrors: EvalError[] = [];

  timeStep = 0;
  cycle = 0;
  /** Set when a wired slot's value changes during the current subcycle */
  changed = false;

  constructor(slots: readonly SlotInfo[]) {
    this.slots = slots;
    this.values = slots.map(() => 0);
    this.flags = slots.map(() => false);
  }

  /** True when nothing is wired to the slot's port */
  isNullSlot(slot: number): boolean {
    return this.slots[slot].isNull;
  }

  // ===========================================================================
  // Reading
  // ===========================================================================

  recvBehavior(slot: number): number {
    return this.values[slot];
  }

  behaviorChanged(slot: number): boolean {
    return this.flags[slot];
  }

  recvEvent(slot: number): number | null {
    return this.flags[slot] ? this.values[slot] : null;
  }

  hasEvent(slot: number): boolean {
    return this.flags[slot];
  }

  recvAnalog(slot: number): Fixed {
    return this.values[slot];
  }

  // ===========================================================================
  // Writing
  // ===========================================================================

  sendBehavior(slot: number, value: number): void {
    const masked = value & wireMask(this.slots[slot].size);
    if (this.values[slot] !== masked) {
      this.values[slot] = masked;
      this.flags[slot] = true;
      this.markChanged(slot);
    }
  }

  sendEvent(slot: number, value: number): void {
    if (this.flags[slot]) {
      const info = this.slots[slot];
      const message = 'Two events were sent on the same wire in one cycle';
      this.reportError(
        info.source ? this.fatalPortError(info.source, message) : this.fatalError(message),
      );
      return;
    }
    this.values[slot] = value & wireMask(this.slots[slot].size);
    this.flags[slot] = true;
    this.markChanged(slot);
  }

  sendAnalog(slot: number, value: Fixed): void {
    const clamped = fixed(value);
    if (this.values[slot] !== clamped) {
      this.values[slot] = clamped;
      this.flags[slot] = true;
      this.markChanged(slot);
    }
  }

  breakpoint(coords: Coords): void {
    this.pendingBreakpoints.push(coords);
  }

  reportError(error: EvalError): void {
    this.pendingErrors.push(error);
  }

  private markChanged(slot: number): void {
    if (!this.slots[slot].isNull) this.changed = true;
  }

  // ===========================================================================
  // Error helpers
  // ===========================================================================

  fatalError(message: string): EvalError {
    return { timeStep: this.timeStep, port: null, fatal: true, message };
  }

  portError(port: PortLoc, message: string): EvalError {
    return { timeStep: this.timeStep, port, fatal: false, message };
  }

  fatalPortError(port: PortLoc, message: string): EvalError {
    return { timeStep: this.timeStep, port, fatal: true, message };
  }

  // ===========================================================================
  // Evaluator bookkeeping
  // ===========================================================================

  /** Clear change flags and events before the next cycle */
  resetForCycle(): void {
    this.flags.fill(false);
  }

  resetForSubcycle(): void {
    this.changed = false;
  }

  takeBreakpoints(): Coords[] {
    const taken = this.pendingBreakpoints;
    this.pendingBreakpoints = [];
    return taken;
  }

  takeErrors(): EvalError[] {
    const taken = this.pendingErrors;
    this.pendingErrors = [];
    return taken;
  }
}
