import React from 'react'
import type { ViewProjection } from '../types'

interface LinePlotViewProps {
  projection: ViewProjection
  title: string
  units: string
}

const VIEW_LABELS: Record<ViewProjection['view'], string> = {
  full_3d: '3D view',
  plan: 'Plan view',
  profile: 'Profile view',
  flattened_profile: 'Flat profile view',
}

const ISO_COS = Math.cos(Math.PI / 6)
const ISO_SIN = Math.sin(Math.PI / 6)

// Screen-plane (x, y) for a projected point; 3D uses a fixed isometric view.
export const toScreenPlane = (coords: number[]): { x: number; y: number } => {
  if (coords.length === 3) {
    const [e, n, u] = coords
    return { x: (e - n) * ISO_COS, y: (e + n) * ISO_SIN + u }
  }
  return { x: coords[0], y: coords[1] }
}

const LinePlotView: React.FC<LinePlotViewProps> = ({ projection, title, units }) => {
  const viewW = 1000
  const viewH = 700

  const planar = projection.points.map((p) => ({ name: p.name, ...toScreenPlane(p.coords) }))
  const xs = planar.map((p) => p.x)
  const ys = planar.map((p) => p.y)
  const minX = Math.min(...xs)
  const maxX = Math.max(...xs)
  const minY = Math.min(...ys)
  const maxY = Math.max(...ys)
  const pad = Math.max((maxX - minX) * 0.1, (maxY - minY) * 0.1, 1)
  const bbox = { minX: minX - pad, minY: minY - pad, width: maxX - minX + pad * 2, height: maxY - minY + pad * 2 }
  // one scale for both axes so the cave keeps its shape
  const scale = Math.min(viewW / bbox.width, viewH / bbox.height)

  const project = (coords: number[]) => {
    const { x, y } = toScreenPlane(coords)
    return { x: (x - bbox.minX) * scale, y: viewH - (y - bbox.minY) * scale }
  }

  return (
    <svg xmlns="http://www.w3.org/2000/svg" viewBox={`0 0 ${viewW} ${viewH}`} width={viewW} height={viewH}>
      <title>{`${title} - ${VIEW_LABELS[projection.view]}`}</title>
      <rect x={0} y={0} width={viewW} height={viewH} fill="#ffffff" />
      <text x={16} y={28} fontSize={18} fill="#0f172a">
        {title}
      </text>
      <text x={16} y={48} fontSize={12} fill="#64748b">
        {VIEW_LABELS[projection.view]} ({projection.axes.join(' / ')}, {units})
      </text>

      {projection.segments.map((seg) => {
        const p1 = project(seg.start)
        const p2 = project(seg.end)
        return (
          <line
            key={`seg-${seg.to}`}
            x1={p1.x}
            y1={p1.y}
            x2={p2.x}
            y2={p2.y}
            stroke="#0f172a"
            strokeWidth={1.5}
          />
        )
      })}

      {projection.points.map((p) => {
        const proj = project(p.coords)
        return (
          <g key={p.name}>
            <path
              d={`M${proj.x - 5},${proj.y + 4} L${proj.x + 5},${proj.y + 4} L${proj.x},${proj.y - 5} z`}
              fill="#2563eb"
            />
            <text x={proj.x + 8} y={proj.y - 8} fontSize={10} fill="#334155">
              {p.name}
            </text>
          </g>
        )
      })}
    </svg>
  )
}

export default LinePlotView
