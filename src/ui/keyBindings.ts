/**
 * Keyboard shortcuts shared by every screen.
 */
import { useEffect, useRef } from 'react';

export type KeyAction = 'submit' | 'back' | 'cancel' | 'refresh' | 'help' | 'up' | 'down';

export type KeyBindings = Record<KeyAction, string>;

export const DEFAULT_BINDINGS: KeyBindings = {
  submit: 'Enter',
  back: 'Ctrl+Backspace',
  cancel: 'Escape',
  refresh: 'F5',
  help: 'F1',
  up: 'ArrowUp',
  down: 'ArrowDown',
};

export const ACTION_LABELS: Record<KeyAction, string> = {
  submit: 'Submit',
  back: 'Back',
  cancel: 'Cancel',
  refresh: 'Refresh',
  help: 'Help',
  up: 'Previous item',
  down: 'Next item',
};

/** The parts of a KeyboardEvent a chord is made of */
export interface KeyChord {
  key: string;
  ctrlKey?: boolean;
  altKey?: boolean;
  shiftKey?: boolean;
  metaKey?: boolean;
}

/** Ctrl+Shift+S style name; single letters are upper-cased. */
export function chordName(chord: KeyChord): string {
  const parts: string[] = [];
  if (chord.ctrlKey) parts.push('Ctrl');
  if (chord.altKey) parts.push('Alt');
  if (chord.shiftKey) parts.push('Shift');
  if (chord.metaKey) parts.push('Meta');
  parts.push(chord.key.length === 1 ? chord.key.toUpperCase() : chord.key);
  return parts.join('+');
}

export function resolveAction(chord: KeyChord, bindings: KeyBindings = DEFAULT_BINDINGS): KeyAction | null {
  const name = chordName(chord);
  for (const [action, binding] of Object.entries(bindings)) {
    if (binding === name && isKeyAction(action)) return action;
  }
  return null;
}

function isKeyAction(value: string): value is KeyAction {
  return value in DEFAULT_BINDINGS;
}

/** Index moved by delta, wrapping around both ends. */
export function wrapIndex(index: number, delta: number, length: number): number {
  if (length <= 0) return 0;
  return (((index + delta) % length) + length) % length;
}

export type KeyHandlers = Partial<Record<KeyAction, () => void>>;

interface UseKeyBindingsOptions {
  enabled?: boolean;
  bindings?: KeyBindings;
}

/**
 * Listen for the bound chords on window while mounted.
 * Only actions with a handler swallow their key.
 */
export function useKeyBindings(handlers: KeyHandlers, { enabled = true, bindings = DEFAULT_BINDINGS }: UseKeyBindingsOptions = {}) {
  const handlersRef = useRef(handlers);
  handlersRef.current = handlers;

  useEffect(() => {
    if (!enabled) return;

    const onKeyDown = (event: KeyboardEvent) => {
      if (event.repeat) return;
      const action = resolveAction(event, bindings);
      if (action === null) return;

      // keep arrows working inside selects and text fields
      const target = event.target;
      if ((action === 'up' || action === 'down') && target instanceof HTMLElement && target.closest('select, input, textarea')) {
        return;
      }

      const handler = handlersRef.current[action];
      if (!handler) return;
      event.preventDefault();
      handler();
    };

    window.addEventListener('keydown', onKeyDown);
    return () => window.removeEventListener('keydown', onKeyDown);
  }, [enabled, bindings]);
}
