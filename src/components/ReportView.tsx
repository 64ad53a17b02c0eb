import React from 'react'
import { AlertTriangle, CheckCircle } from 'lucide-react'
import type { LinePlotRun, Reading } from '../types'

interface ReportViewProps {
  run: LinePlotRun
}

const fmt = (n: number, digits = 2) => n.toFixed(digits)

export const formatReading = (reading: Reading): string => {
  switch (reading.kind) {
    case 'absent':
      return '-'
    case 'single':
      return String(reading.value)
    case 'paired':
      return `${reading.fore}/${reading.back}`
  }
}

const ReportView: React.FC<ReportViewProps> = ({ run }) => {
  const { network, warnings, logs } = run
  const units = network.distanceUnits

  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <title>{`${network.title} survey report`}</title>
      </head>
      <body>
        <h1>{network.title}</h1>
        <p>
          Origin <strong>{network.originName}</strong> at (0, 0, 0). {network.stations.length} stations,{' '}
          {network.shots.length} shots, distances in {units}.
        </p>

        <section>
          <h2>Stations</h2>
          <table>
            <thead>
              <tr>
                <th>Station</th>
                <th>East</th>
                <th>North</th>
                <th>Up</th>
                <th>Along</th>
              </tr>
            </thead>
            <tbody>
              {network.stations.map((s) => (
                <tr key={s.name}>
                  <td>{s.name}</td>
                  <td>{fmt(s.position[0])}</td>
                  <td>{fmt(s.position[1])}</td>
                  <td>{fmt(s.position[2])}</td>
                  <td>{fmt(s.flatPosition[0])}</td>
                </tr>
              ))}
            </tbody>
          </table>
        </section>

        <section>
          <h2>Shots</h2>
          <table>
            <thead>
              <tr>
                <th>From</th>
                <th>To</th>
                <th>Distance</th>
                <th>Azimuth</th>
                <th>Inclination</th>
                <th>L/R/U/D</th>
                <th>Note</th>
              </tr>
            </thead>
            <tbody>
              {network.shots.map((shot) => (
                <tr key={shot.name}>
                  <td>{shot.from}</td>
                  <td>{shot.name}</td>
                  <td>{fmt(shot.distance)}</td>
                  <td>{fmt(shot.azimuth, 1)}</td>
                  <td>{fmt(shot.inclination, 1)}</td>
                  <td>{[shot.left, shot.right, shot.up, shot.down].map(formatReading).join(' ')}</td>
                  <td>{shot.note}</td>
                </tr>
              ))}
            </tbody>
          </table>
        </section>

        <section>
          <h2>Fore/backsight checks</h2>
          {warnings.length === 0 ? (
            <p>
              <CheckCircle size={14} /> All paired readings within tolerance.
            </p>
          ) : (
            <ul>
              {warnings.map((w) => (
                <li key={`${w.shot}-${w.field}`}>
                  <AlertTriangle size={14} /> {`${w.shot}: ${w.field} ${w.fore}/${w.back} off by ${fmt(w.difference)}° (tolerance ${w.tolerance}°)`}
                </li>
              ))}
            </ul>
          )}
        </section>

        {logs.length > 0 && (
          <section>
            <h2>Log</h2>
            <pre>{logs.join('\n')}</pre>
          </section>
        )}
      </body>
    </html>
  )
}

export default ReportView
