import { useEffect, useState } from 'react'

interface StatusHintProps {
  isLoading: boolean
  error: string | null
}

// Fast loads never flash the pill.
const SLOW_LOADING_HINT_DELAY_MS = 300

export default function StatusHint({ isLoading, error }: StatusHintProps) {
  const [showLoadingHint, setShowLoadingHint] = useState(false)

  useEffect(() => {
    const timer = setTimeout(() => {
      setShowLoadingHint(isLoading)
    }, isLoading ? SLOW_LOADING_HINT_DELAY_MS : 0)

    return () => {
      clearTimeout(timer)
    }
  }, [isLoading])

  if (error) {
    return (
      <span role="alert" className="sc-status-pill sc-status-danger">
        班次加载失败
      </span>
    )
  }

  if (isLoading && showLoadingHint) {
    return <span className="sc-status-pill sc-status-muted">加载中</span>
  }

  return null
}
