import { useToast, type ToastKind, type ToastLevel } from '../../hooks/use-toast'

const LEVEL_CLASS: Record<ToastLevel, string> = {
  success: 'sc-toast-success',
  info: 'sc-toast-info',
  warning: 'sc-toast-warning',
  error: 'sc-toast-error',
}

const KIND_LABEL: Record<ToastKind, string> = {
  schedule: '排班',
  selection: '批量选择',
  system: '系统',
}

export default function ToastCenter() {
  const { toasts, dismiss } = useToast()

  if (toasts.length === 0) {
    return null
  }

  return (
    <section className="sc-toast-center" aria-live="polite" aria-atomic="true" data-testid="toast-center">
      {toasts.map((toast) => (
        <article key={toast.id} role="status" data-testid={`toast-${toast.kind}`} className={`sc-toast ${LEVEL_CLASS[toast.level]}`}>
          <header className="sc-toast-header">
            <strong>{KIND_LABEL[toast.kind]}</strong>
            <button type="button" onClick={() => dismiss(toast.kind)} aria-label="关闭提示" className="sc-toast-dismiss">
              ×
            </button>
          </header>
          {toast.title ? <p className="sc-toast-title">{toast.title}</p> : null}
          <p className="sc-toast-message">{toast.message}</p>
        </article>
      ))}
    </section>
  )
}
