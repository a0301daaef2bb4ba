// rotaryNavigator.ts — in-process input router for one window
//
// Turns controller input (nudge, rotate) into the actions regions and the
// sink understand, in the order the routing service applies them:
//
//   nudge:  restore (touch mode / no focus) → NUDGE_SHORTCUT
//           → NUDGE_TO_ANOTHER_REGION → nearest region + FOCUS
//   rotate: next/previous focusable view within the focused region, no wrap

import { Emitter, Event } from '../platform/events.js';
import { Disposable } from '../platform/lifecycle.js';
import type { View } from '../view/view.js';
import type { ViewWindow } from '../view/viewWindow.js';
import { BoundsFocusFinder, IFocusFinder } from './focusFinder.js';
import {
  FocusLevel,
  adjustFocus,
  collectFocusRegions,
  collectFocusableDescendants,
  findFirstFocusableDescendant,
  findFocusSink,
  getAncestorFocusRegion,
  requestFocusOn,
} from './focusUtils.js';
import { Direction, RotaryAction, nudgeArguments } from './rotaryConstants.js';
import type { FocusRegion } from './focusRegion.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export enum NavigationOutcome {
  /** Focus was (re)initialized through the sink. */
  RestoredFocus = 'restoredFocus',
  Shortcut = 'shortcut',
  /** An explicit or remembered target region took focus. */
  AnotherRegion = 'anotherRegion',
  /** The nearest region in the direction took focus. */
  NearestRegion = 'nearestRegion',
  Rotated = 'rotated',
  /** Focus did not move. */
  Blocked = 'blocked',
}

export interface NavigationEvent {
  readonly kind: 'nudge' | 'rotate';
  readonly direction?: Direction;
  readonly steps?: number;
  readonly outcome: NavigationOutcome;
  readonly from: View | undefined;
  readonly to: View | undefined;
}

export interface RotaryNavigatorOptions {
  readonly focusFinder?: IFocusFinder;
}

// ─── RotaryNavigator ─────────────────────────────────────────────────────────

export class RotaryNavigator extends Disposable {
  private readonly _focusFinder: IFocusFinder;

  private readonly _onDidNavigate = this._register(new Emitter<NavigationEvent>());
  readonly onDidNavigate: Event<NavigationEvent> = this._onDidNavigate.event;

  constructor(
    private readonly _window: ViewWindow,
    options: RotaryNavigatorOptions = {},
  ) {
    super();
    this._focusFinder = options.focusFinder ?? new BoundsFocusFinder();
  }

  /**
   * Move focus to another region in `direction`.
   */
  nudge(direction: Direction): NavigationOutcome {
    const from = this._window.focusedView;
    const outcome = this._nudge(direction, from);
    this._onDidNavigate.fire({ kind: 'nudge', direction, outcome, from, to: this._window.focusedView });
    return outcome;
  }

  /**
   * Move focus `steps` views forward (positive) or backward (negative)
   * within the focused view's region, stopping at either end.
   */
  rotate(steps: number): NavigationOutcome {
    const from = this._window.focusedView;
    const outcome = this._rotate(Math.trunc(steps), from);
    this._onDidNavigate.fire({ kind: 'rotate', steps, outcome, from, to: this._window.focusedView });
    return outcome;
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private _nudge(direction: Direction, from: View | undefined): NavigationOutcome {
    if (this._needsRestore(from)) {
      return this._restoreFocus();
    }
    if (!from) return NavigationOutcome.Blocked;

    const region = getAncestorFocusRegion(from);
    if (!region) {
      console.warn(`[RotaryNavigator] Cannot nudge from ${from}: it is not in a focus region`);
      return NavigationOutcome.Blocked;
    }

    const args = nudgeArguments(direction);
    if (region.performAction(RotaryAction.NudgeShortcut, args)) {
      return NavigationOutcome.Shortcut;
    }
    if (region.performAction(RotaryAction.NudgeToAnotherRegion, args)) {
      return NavigationOutcome.AnotherRegion;
    }

    const target = this._focusFinder.findNudgeTarget(region, direction, this._candidateRegions(region));
    if (target?.performAction(RotaryAction.Focus, args)) {
      return NavigationOutcome.NearestRegion;
    }
    return NavigationOutcome.Blocked;
  }

  private _rotate(steps: number, from: View | undefined): NavigationOutcome {
    if (this._needsRestore(from)) {
      return this._restoreFocus();
    }
    if (!from || steps === 0) return NavigationOutcome.Blocked;

    const scope: View = getAncestorFocusRegion(from) ?? this._window.root;
    const views = collectFocusableDescendants(scope);
    const index = views.indexOf(from);
    if (index < 0) return NavigationOutcome.Blocked;

    const targetIndex = Math.min(Math.max(index + steps, 0), views.length - 1);
    if (targetIndex === index) return NavigationOutcome.Blocked;
    return requestFocusOn(views[targetIndex]) ? NavigationOutcome.Rotated : NavigationOutcome.Blocked;
  }

  private _needsRestore(from: View | undefined): boolean {
    return this._window.isInTouchMode || !from || from.isFocusSink;
  }

  private _restoreFocus(): NavigationOutcome {
    this._window.setTouchMode(false);
    const sink = findFocusSink(this._window.root);
    const success = sink
      ? sink.performAction(RotaryAction.RestoreDefaultFocus)
      : adjustFocus(this._window.root, FocusLevel.NoFocus);
    return success ? NavigationOutcome.RestoredFocus : NavigationOutcome.Blocked;
  }

  private _candidateRegions(source: FocusRegion): FocusRegion[] {
    return collectFocusRegions(this._window.root).filter(region =>
      region !== source && region.isShown() && findFirstFocusableDescendant(region) !== undefined,
    );
  }
}
