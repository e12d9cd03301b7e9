import {
  createContext,
  createElement,
  useCallback,
  useContext,
  useEffect,
  useMemo,
  useState,
  type PropsWithChildren,
} from 'react'

export type ToastKind = 'schedule' | 'selection' | 'system'
export type ToastLevel = 'success' | 'info' | 'warning' | 'error'

export interface ToastInput {
  kind: ToastKind
  level: ToastLevel
  title?: string
  message: string
  /** Overrides the per-level dismiss delay. */
  durationMs?: number
  sticky?: boolean
}

export interface ToastMessage {
  id: string
  kind: ToastKind
  level: ToastLevel
  title: string | null
  message: string
  expiresAt: number | null
}

interface ToastContextValue {
  toasts: ToastMessage[]
  push: (input: ToastInput) => ToastMessage
  dismiss: (kind: ToastKind) => void
}

const ToastContext = createContext<ToastContextValue | null>(null)

export const TOAST_DURATION_MS: Record<ToastLevel, number> = {
  success: 2000,
  info: 2000,
  warning: 3000,
  error: 4000,
}

let toastSequence = 0

function nextToastId(kind: ToastKind): string {
  toastSequence += 1
  return `${kind}-${toastSequence}`
}

export function ToastProvider({ children }: PropsWithChildren) {
  const [toasts, setToasts] = useState<ToastMessage[]>([])

  const dismiss = useCallback((kind: ToastKind) => {
    setToasts((previous) => previous.filter((toast) => toast.kind !== kind))
  }, [])

  // One live toast per kind: a newer message replaces the older one.
  const push = useCallback((input: ToastInput): ToastMessage => {
    const duration = input.durationMs ?? TOAST_DURATION_MS[input.level]
    const toast: ToastMessage = {
      id: nextToastId(input.kind),
      kind: input.kind,
      level: input.level,
      title: input.title ?? null,
      message: input.message,
      expiresAt: input.sticky ? null : Date.now() + duration,
    }
    setToasts((previous) => [toast, ...previous.filter((item) => item.kind !== input.kind)])
    return toast
  }, [])

  useEffect(() => {
    const timers: ReturnType<typeof setTimeout>[] = []
    for (const toast of toasts) {
      if (toast.expiresAt === null) {
        continue
      }
      const remaining = Math.max(0, toast.expiresAt - Date.now())
      timers.push(
        setTimeout(() => {
          setToasts((previous) => previous.filter((item) => item.id !== toast.id))
        }, remaining),
      )
    }

    return () => {
      timers.forEach((timer) => clearTimeout(timer))
    }
  }, [toasts])

  const value = useMemo<ToastContextValue>(() => ({ toasts, push, dismiss }), [dismiss, push, toasts])

  return createElement(ToastContext.Provider, { value }, children)
}

export function useToast(): ToastContextValue {
  const context = useContext(ToastContext)
  if (!context) {
    throw new Error('useToast 必须在 ToastProvider 内使用')
  }
  return context
}
