export interface NoticeState {
  kind: 'success' | 'error';
  text: string;
}

interface NoticeProps {
  notice: NoticeState | null;
  onDismiss?: () => void;
}

export function Notice({ notice, onDismiss }: NoticeProps) {
  if (!notice) return null;

  return (
    <div className={`notice notice-${notice.kind}`} role={notice.kind === 'error' ? 'alert' : 'status'}>
      <span>{notice.text}</span>
      {onDismiss && (
        <button type="button" className="notice-dismiss" aria-label="Dismiss" onClick={onDismiss}>
          ×
        </button>
      )}
    </div>
  );
}
