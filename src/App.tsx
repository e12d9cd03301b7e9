import { useState } from 'react'
import { QueryClient, QueryClientProvider } from '@tanstack/react-query'
import { BrowserRouter, Navigate, Route, Routes } from 'react-router-dom'
import ToastCenter from './components/common/toast-center'
import { ToastProvider } from './hooks/use-toast'
import SchedulePage from './pages/schedule'
import { buildDemoShifts, DEMO_SHIFT_TYPES } from './services/demo-data'
import { createInMemoryShiftSource, type ShiftSource } from './services/shift-source'
import type { ShiftType } from './types/shift'

export interface AppProps {
  shiftSource?: ShiftSource
  shiftTypes?: readonly ShiftType[]
}

function createDemoSource(): ShiftSource {
  return createInMemoryShiftSource(buildDemoShifts(new Date()))
}

export default function App({ shiftSource, shiftTypes = DEMO_SHIFT_TYPES }: AppProps) {
  const [queryClient] = useState(() => new QueryClient({ defaultOptions: { queries: { retry: 1 } } }))
  const [source] = useState(() => shiftSource ?? createDemoSource())

  return (
    <QueryClientProvider client={queryClient}>
      <ToastProvider>
        <BrowserRouter>
          <main className="sc-app">
            <Routes>
              <Route path="/schedule" element={<SchedulePage shiftSource={source} shiftTypes={shiftTypes} />} />
              <Route path="*" element={<Navigate to="/schedule" replace />} />
            </Routes>
          </main>
          <ToastCenter />
        </BrowserRouter>
      </ToastProvider>
    </QueryClientProvider>
  )
}
