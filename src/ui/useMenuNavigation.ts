import { useState } from 'react';
import { useKeyBindings, wrapIndex } from './keyBindings';

/**
 * Arrow-key navigation over a vertical list of menu items.
 * Up/down wrap around, Enter activates, Escape goes back.
 */
export function useMenuNavigation(count: number, onActivate: (index: number) => void, onBack?: () => void) {
  const [focused, setFocused] = useState(0);

  useKeyBindings({
    up: () => setFocused((i) => wrapIndex(i, -1, count)),
    down: () => setFocused((i) => wrapIndex(i, 1, count)),
    submit: () => onActivate(focused),
    cancel: onBack,
  });

  return { focused, setFocused };
}
