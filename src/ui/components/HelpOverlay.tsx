import { ACTION_LABELS, DEFAULT_BINDINGS, type KeyAction } from '../keyBindings';

interface HelpOverlayProps {
  onClose: () => void;
}

const ACTIONS: KeyAction[] = ['submit', 'back', 'cancel', 'refresh', 'help', 'up', 'down'];

export function HelpOverlay({ onClose }: HelpOverlayProps) {
  return (
    <div className="overlay" role="dialog" aria-label="Keyboard shortcuts" onClick={onClose}>
      <div className="overlay-card" onClick={(e) => e.stopPropagation()}>
        <h2>Keyboard shortcuts</h2>
        <table className="help-table">
          <tbody>
            {ACTIONS.map((action) => (
              <tr key={action}>
                <td>
                  <kbd>{DEFAULT_BINDINGS[action]}</kbd>
                </td>
                <td>{ACTION_LABELS[action]}</td>
              </tr>
            ))}
          </tbody>
        </table>
        <button type="button" className="btn" onClick={onClose}>
          Close
        </button>
      </div>
    </div>
  );
}
