import { StrictMode, Component } from 'react'
import type { ReactNode } from 'react'
import { createRoot } from 'react-dom/client'
import './index.css'
import App from './App.tsx'
import { getLogger } from './engine/logger'

const log = getLogger('main')

function showFatal(text: string) {
  const root = document.getElementById('root')
  if (!root) return
  const pre = document.createElement('pre')
  pre.className = 'fatal-error'
  pre.textContent = text
  root.replaceChildren(pre)
}

window.addEventListener('error', (e) => {
  log.error('Uncaught error', { message: e.message })
  showFatal(String(e.error || e.message))
})

window.addEventListener('unhandledrejection', (e) => {
  log.error('Unhandled promise rejection', { reason: String(e.reason) })
  showFatal(String(e.reason))
})

interface ErrorBoundaryState { error: Error | null }

class ErrorBoundary extends Component<{ children: ReactNode }, ErrorBoundaryState> {
  state: ErrorBoundaryState = { error: null }
  static getDerivedStateFromError(error: Error) { return { error } }
  componentDidCatch(error: Error) {
    log.error('Render error', { message: error.message })
  }
  render() {
    if (!this.state.error) return this.props.children
    return (
      <div className="render-error" role="alert">
        <h2>The analyser stopped</h2>
        <p>{this.state.error.message}</p>
        <button type="button" onClick={() => window.location.reload()}>Reload</button>
      </div>
    )
  }
}

const rootElement = document.getElementById('root')
if (!rootElement) throw new Error('Missing #root element')

createRoot(rootElement).render(
  <StrictMode>
    <ErrorBoundary>
      <App />
    </ErrorBoundary>
  </StrictMode>,
)
