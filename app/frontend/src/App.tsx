import { useState } from 'react'
import { BrowserRouter, Routes, Route, NavLink } from 'react-router-dom'
import { Database, MapPin, Zap } from 'lucide-react'
import { config } from './config'
import { createFaultServices, FaultServicesProvider } from './context/FaultServicesContext'
import GeocodeCache from './pages/GeocodeCache'
import LiveFaults from './pages/LiveFaults'

const NAV_ITEMS = [
  { to: '/',          label: 'Live Faults',   Icon: MapPin },
  { to: '/geocoding', label: 'Geocode Cache', Icon: Database },
]

function Sidebar() {
  return (
    <aside className="flex w-56 shrink-0 flex-col bg-gray-900 text-gray-100">
      {/* Brand */}
      <div className="flex items-center gap-2 border-b border-gray-700 px-5 py-4">
        <Zap className="text-amber-400" size={22} />
        <span className="text-sm font-bold leading-tight tracking-tight">
          Live Faults<br />Tracker
        </span>
      </div>

      <nav className="flex-1 overflow-y-auto px-2 py-3">
        {NAV_ITEMS.map(({ to, label, Icon }) => (
          <NavLink
            key={to}
            to={to}
            end={to === '/'}
            className={({ isActive }) =>
              `flex items-center gap-3 rounded-md px-3 py-2 text-sm font-medium transition-colors ${
                isActive ? 'bg-gray-700 text-white' : 'text-gray-400 hover:bg-gray-800 hover:text-white'
              }`
            }
          >
            <Icon size={18} />
            {label}
          </NavLink>
        ))}
      </nav>

      <div className="border-t border-gray-700 px-5 py-3 text-xs text-gray-500">
        Geocoding © OpenStreetMap contributors
      </div>
    </aside>
  )
}

export default function App() {
  // One set of services per app instance; the geocode cache lives as long as it does.
  const [services] = useState(() => createFaultServices(config))

  return (
    <FaultServicesProvider services={services}>
      <BrowserRouter>
        <div className="flex h-screen overflow-hidden bg-gray-50 dark:bg-gray-900">
          <Sidebar />
          <main className="min-w-0 flex-1 overflow-auto">
            <Routes>
              <Route path="/"          element={<LiveFaults />}   />
              <Route path="/geocoding" element={<GeocodeCache />} />
              <Route path="*"          element={<LiveFaults />}   />
            </Routes>
          </main>
        </div>
      </BrowserRouter>
    </FaultServicesProvider>
  )
}
