/**
 * Unit tests for the in-memory view tree — parenting rules, visibility,
 * detaching, touch mode and the window's focus re-validation.
 */

import { describe, expect, it } from 'vitest';
import { RotaryAction } from '../../src/rotary/rotaryConstants.js';
import { RotaryConfigurationError } from '../../src/rotary/rotaryErrors.js';
import { ViewGroup } from '../../src/view/viewGroup.js';
import { ViewWindow } from '../../src/view/viewWindow.js';
import { FocusChangeEvent, Visibility } from '../../src/view/viewTypes.js';
import { createButton } from './rotaryTestUtils.js';

// ── Helpers ─────────────────────────────────────────────────────────────────

function createWindowWithGroup(options: { inTouchMode?: boolean } = {}) {
  const window = new ViewWindow({ id: 'tree', inTouchMode: options.inTouchMode });
  const group = new ViewGroup({ id: 'group' });
  const button = createButton('button');
  group.addView(button);
  window.addView(group);

  const events: FocusChangeEvent[] = [];
  window.onDidChangeFocus(e => events.push(e));
  return { window, group, button, events };
}

// ── Structure ───────────────────────────────────────────────────────────────

describe('ViewGroup structure', () => {
  it('rejects a child that already has a parent', () => {
    const first = new ViewGroup({ id: 'first' });
    const second = new ViewGroup({ id: 'second' });
    const child = createButton('child');
    first.addView(child);

    expect(() => second.addView(child)).toThrow(RotaryConfigurationError);
  });

  it('rejects a cycle', () => {
    const outer = new ViewGroup({ id: 'outer' });
    const inner = new ViewGroup({ id: 'inner' });
    outer.addView(inner);

    expect(() => inner.addView(outer)).toThrow(RotaryConfigurationError);
  });

  it('inserts at an index', () => {
    const group = new ViewGroup({ id: 'group' });
    const a = createButton('a');
    const b = createButton('b');
    group.addView(a);
    group.addView(b, 0);

    expect(group.getChildAt(0)).toBe(b);
    expect(group.childCount).toBe(2);
  });

  it('finds views by id', () => {
    const { window, group, button } = createWindowWithGroup();

    expect(window.findViewById('button')).toBe(button);
    expect(window.findViewById('group')).toBe(group);
    expect(window.findViewById('missing')).toBeUndefined();
  });

  it('removeAllViews() empties the group', () => {
    const { group, button } = createWindowWithGroup();
    group.removeAllViews();

    expect(group.childCount).toBe(0);
    expect(button.parent).toBeUndefined();
    expect(button.isAttachedToWindow).toBe(false);
  });
});

// ── Visibility and attachment ───────────────────────────────────────────────

describe('View visibility and attachment', () => {
  it('is shown only when it and its ancestors are visible and attached', () => {
    const { group, button } = createWindowWithGroup();
    expect(button.isShown()).toBe(true);

    group.setVisibility(Visibility.Invisible);
    expect(button.isShown()).toBe(false);

    expect(createButton('loose').isShown()).toBe(false);
  });

  it('keeps the parent of a detached child', () => {
    const { window, group, button } = createWindowWithGroup();
    group.detachView(button);

    expect(button.parent).toBe(group);
    expect(button.isAttachedToWindow).toBe(false);
    expect(window.findViewById('button')).toBeUndefined();

    group.attachView(button);
    expect(button.isAttachedToWindow).toBe(true);
    expect(window.findViewById('button')).toBe(button);
  });
});

// ── Focus ───────────────────────────────────────────────────────────────────

describe('ViewWindow focus', () => {
  it('announces each focus move once', () => {
    const { window, group, button, events } = createWindowWithGroup();

    expect(button.requestFocus()).toBe(true);
    expect(button.requestFocus()).toBe(true);
    expect(events).toEqual([{ oldFocus: undefined, newFocus: button }]);
    expect(group.hasFocus()).toBe(true);
    expect(group.findFocus()).toBe(button);
    expect(window.focusedView).toBe(button);
  });

  it('drops focus when the focused view goes away and nothing can take over', () => {
    const { window, group, button, events } = createWindowWithGroup();
    button.requestFocus();

    group.removeView(button);
    expect(window.focusedView).toBeUndefined();
    expect(events[1]).toEqual({ oldFocus: button, newFocus: undefined });
  });

  it('hands focus to the next view in tree order', () => {
    const { window, group, button, events } = createWindowWithGroup();
    const other = createButton('other');
    group.addView(other);
    button.requestFocus();

    button.setFocusable(false);
    expect(window.focusedView).toBe(other);
    expect(events[1]).toEqual({ oldFocus: button, newFocus: other });
  });

  it('clearFocus() leaves nothing focused', () => {
    const { window, button, events } = createWindowWithGroup();
    button.requestFocus();

    window.clearFocus();
    expect(window.focusedView).toBeUndefined();
    expect(events).toHaveLength(2);
  });
});

// ── Touch mode ──────────────────────────────────────────────────────────────

describe('ViewWindow touch mode', () => {
  it('clears focus from a view that is not focusable in touch mode', () => {
    const { window, button, events } = createWindowWithGroup();
    const modes: boolean[] = [];
    window.onDidChangeTouchMode(m => modes.push(m));
    button.requestFocus();

    window.setTouchMode(true);
    expect(window.focusedView).toBeUndefined();
    expect(events[1]).toEqual({ oldFocus: button, newFocus: undefined });
    expect(modes).toEqual([true]);
  });

  it('keeps focus on a view that is focusable in touch mode', () => {
    const window = new ViewWindow({ id: 'touch' });
    const field = createButton('field', undefined, { focusableInTouchMode: true });
    window.addView(field);
    field.requestFocus();

    window.setTouchMode(true);
    expect(window.focusedView).toBe(field);
  });

  it('refuses plain focus requests in touch mode', () => {
    const { window, button } = createWindowWithGroup({ inTouchMode: true });

    expect(button.requestFocus()).toBe(false);
    expect(window.focusedView).toBeUndefined();
  });

  it('FOCUS leaves touch mode and focuses the view', () => {
    const { window, button } = createWindowWithGroup({ inTouchMode: true });

    expect(button.performAction(RotaryAction.Focus)).toBe(true);
    expect(window.isInTouchMode).toBe(false);
    expect(window.focusedView).toBe(button);
    expect(button.performAction(RotaryAction.Focus)).toBe(false);
  });
});

// ── Window focus ────────────────────────────────────────────────────────────

describe('ViewWindow window focus', () => {
  it('fires only on change', () => {
    const window = new ViewWindow({ id: 'wf' });
    const changes: boolean[] = [];
    window.onDidChangeWindowFocus(f => changes.push(f));

    window.setWindowFocus(true);
    window.setWindowFocus(false);
    window.setWindowFocus(false);

    expect(changes).toEqual([false]);
    expect(window.hasWindowFocus).toBe(false);
  });
});
