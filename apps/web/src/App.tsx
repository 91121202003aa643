import { Link, Navigate, Route, Routes } from 'react-router-dom'
import { CoversPage } from './pages/CoversPage'
import { HomePage } from './pages/HomePage'
import { JobPage } from './pages/JobPage'
import { Shell } from './ui/Shell'

function NotFound() {
  return (
    <Shell title="Not found">
      <div className="card p-5 text-sm text-zinc-300">
        No such page.{' '}
        <Link to="/" className="font-semibold text-white hover:underline">
          Back to jobs
        </Link>
      </div>
    </Shell>
  )
}

export default function App() {
  return (
    <Routes>
      <Route path="/" element={<HomePage />} />
      <Route path="/jobs/:id" element={<JobPage />} />
      <Route path="/covers" element={<CoversPage />} />
      <Route path="/jobs" element={<Navigate to="/" replace />} />
      <Route path="*" element={<NotFound />} />
    </Routes>
  )
}
