/**
 * Unit tests for FocusSink — restoring focus after the focused view goes
 * away, parking while the window is in the background, and the sink's
 * own actions.
 */

import { describe, expect, it, vi } from 'vitest';
import { FocusSink } from '../../src/rotary/focusSink.js';
import { RotaryAction } from '../../src/rotary/rotaryConstants.js';
import { ViewGroup } from '../../src/view/viewGroup.js';
import { ViewWindow } from '../../src/view/viewWindow.js';
import { FocusChangeEvent, RotaryRole, Visibility } from '../../src/view/viewTypes.js';
import { ManualClock, createButton, createRegion, createStandardWindow, rect } from './rotaryTestUtils.js';

// ── Helpers ─────────────────────────────────────────────────────────────────

/** A window with a region holding a focusable, vertically scrollable list. */
function createListWindow() {
  const window = new ViewWindow({ id: 'list', clock: new ManualClock(), bounds: rect(0, 0, 100, 100) });
  const sink = new FocusSink();
  const list = new ViewGroup({
    id: 'list',
    focusable: true,
    role: RotaryRole.VerticallyScrollable,
    bounds: rect(0, 0, 100, 100),
  });
  const row1 = createButton('row1', rect(0, 0, 100, 30));
  const row2 = createButton('row2', rect(0, 30, 100, 60));
  list.addView(row1);
  list.addView(row2);

  window.addView(sink);
  window.addView(createRegion({ id: 'region', bounds: rect(0, 0, 100, 100) }, list));
  return { window, sink, list, row1, row2 };
}

// ── Restoring focus ─────────────────────────────────────────────────────────

describe('FocusSink restoring focus', () => {
  it('moves focus on when the focused view is removed', () => {
    const { window, region1, view1, view2 } = createStandardWindow();
    view1.requestFocus();
    const events: FocusChangeEvent[] = [];
    window.onDidChangeFocus(e => events.push(e));

    region1.removeView(view1);

    expect(window.focusedView).toBe(view2);
    expect(events).toHaveLength(1);
    expect(events[0].oldFocus).toBe(view1);
    expect(events[0].newFocus).toBe(view2);
  });

  it('moves focus on when the focused view is disabled', () => {
    const { window, view1, view2 } = createStandardWindow();
    view1.requestFocus();

    view1.setEnabled(false);
    expect(window.focusedView).toBe(view2);
  });

  it('moves focus on when the focused view becomes invisible', () => {
    const { window, view1, view2 } = createStandardWindow();
    view1.requestFocus();

    view1.setVisibility(Visibility.Invisible);
    expect(window.focusedView).toBe(view2);
  });

  it('skips the hidden region when the focused view\'s region is hidden', () => {
    const { window, region1, view1, view3 } = createStandardWindow();
    view1.requestFocus();

    region1.setVisibility(Visibility.Gone);
    expect(window.focusedView).toBe(view3);
  });

  it('focuses the list a row scrolled out of', () => {
    const { window, list, row1 } = createListWindow();
    row1.requestFocus();

    list.detachView(row1);
    expect(window.focusedView).toBe(list);
  });

  it('does not focus the list when the row was removed outright', () => {
    const { window, list, row1, row2 } = createListWindow();
    row1.requestFocus();

    list.removeView(row1);
    expect(window.focusedView).toBe(row2);
  });

  it('takes focus itself when nothing else can', () => {
    const window = new ViewWindow({ id: 'empty' });
    const sink = new FocusSink();
    window.addView(sink);

    expect(sink.requestFocus()).toBe(true);
    expect(window.focusedView).toBe(sink);
  });

  it('takes focus itself when restoring is turned off', () => {
    const { window, sink } = createStandardWindow();
    sink.setShouldRestoreFocus(false);

    expect(sink.requestFocus()).toBe(true);
    expect(window.focusedView).toBe(sink);
  });

  it('restores focus instead of taking it by default', () => {
    const { window, sink, view1 } = createStandardWindow();

    expect(sink.requestFocus()).toBe(true);
    expect(window.focusedView).toBe(view1);
  });
});

// ── Window focus ────────────────────────────────────────────────────────────

describe('FocusSink window focus', () => {
  it('parks focus while the window is in the background', () => {
    const { window, sink, view1 } = createStandardWindow();
    view1.requestFocus();
    expect(sink.lastFocusedView).toBe(view1);

    window.setWindowFocus(false);
    expect(window.focusedView).toBe(sink);
    expect(sink.lastFocusedView).toBeUndefined();
  });

  it('restores focus when the window comes back', () => {
    const { window, view1, view3 } = createStandardWindow();
    view3.requestFocus();

    window.setWindowFocus(false);
    window.setWindowFocus(true);
    expect(window.focusedView).toBe(view1);
  });

  it('stops tracking focus once detached', () => {
    const { window, sink, view1, view2 } = createStandardWindow();
    view1.requestFocus();

    window.root.removeView(sink);
    expect(sink.lastFocusedView).toBeUndefined();
    view2.requestFocus();
    expect(sink.lastFocusedView).toBeUndefined();
  });

  it('remembers the scrollable container of the focused view', () => {
    const { sink, list, row1 } = createListWindow();
    row1.requestFocus();

    expect(sink.lastFocusedView).toBe(row1);
    expect(sink.lastScrollableContainer).toBe(list);
  });
});

// ── Actions ─────────────────────────────────────────────────────────────────

describe('FocusSink actions', () => {
  it('FOCUS parks without leaving touch mode', () => {
    const { window, sink } = createStandardWindow({ inTouchMode: true });

    expect(sink.performAction(RotaryAction.Focus)).toBe(true);
    expect(window.focusedView).toBe(sink);
    expect(window.isInTouchMode).toBe(true);
    expect(sink.performAction(RotaryAction.Focus)).toBe(false);
  });

  it('restoreFocus(true) fails in touch mode', () => {
    const { window, sink } = createStandardWindow({ inTouchMode: true });

    expect(sink.restoreFocus(true)).toBe(false);
    expect(window.focusedView).toBeUndefined();
  });

  it('RESTORE_DEFAULT_FOCUS works in touch mode', () => {
    const { window, sink, view1 } = createStandardWindow({ inTouchMode: true });

    expect(sink.performAction(RotaryAction.RestoreDefaultFocus)).toBe(true);
    expect(window.focusedView).toBe(view1);
    expect(window.isInTouchMode).toBe(false);
  });

  it('HIDE_IME asks the input method to hide', () => {
    const hideSoftInput = vi.fn(() => true);
    const window = new ViewWindow({ id: 'ime' });
    const sink = new FocusSink({ inputMethod: { hideSoftInput } });
    window.addView(sink);

    expect(sink.performAction(RotaryAction.HideIme)).toBe(true);
    expect(hideSoftInput).toHaveBeenCalledTimes(1);
  });

  it('HIDE_IME fails without an input method', () => {
    const { sink } = createStandardWindow();
    expect(sink.performAction(RotaryAction.HideIme)).toBe(false);
  });

  it('ignores region-only actions', () => {
    const { sink } = createStandardWindow();
    expect(sink.performAction(RotaryAction.NudgeShortcut)).toBe(false);
  });
});
