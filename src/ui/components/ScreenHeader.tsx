interface ScreenHeaderProps {
  title: string;
  onBack?: () => void;
}

export function ScreenHeader({ title, onBack }: ScreenHeaderProps) {
  return (
    <header className="page-header">
      {onBack && (
        <button type="button" className="btn btn-ghost" onClick={onBack} title="Back (Ctrl+Backspace)">
          ← Back
        </button>
      )}
      <h1 className="page-title">{title}</h1>
    </header>
  );
}
