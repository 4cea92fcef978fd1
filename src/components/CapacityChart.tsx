import { BarChart, Bar, Cell, XAxis, YAxis, CartesianGrid, Tooltip, LabelList, ResponsiveContainer } from 'recharts';
import type { CapacityResult } from '../lib/types';

const PALETTE = ['#8c6e54', '#c08b5c', '#3d2b1f', '#a3b18a', '#588157'];

export const formatUnits = (v: unknown) => (typeof v === 'number' ? Math.round(v).toLocaleString() : String(v));
export const formatBarLabel = (v: unknown) => (typeof v === 'number' ? v.toFixed(0) : '');

interface Props {
  results: CapacityResult[];
  shiftHours: number;
  width?: number;
  height?: number;
  animate?: boolean;
}

export function CapacityChart({ results, shiftHours, width, height = 320, animate = true }: Props) {
  const chart = (
    <BarChart data={results} width={width} height={height}>
      <CartesianGrid strokeDasharray="3 3" />
      <XAxis dataKey="stageName" />
      <YAxis />
      <Tooltip formatter={formatUnits} />
      <Bar dataKey="dailyCapacityUnits" name="Daily Capacity" isAnimationActive={animate}>
        {results.map((r, i) => (
          <Cell key={r.stageName} fill={PALETTE[i % PALETTE.length]} />
        ))}
        <LabelList dataKey="dailyCapacityUnits" position="top" formatter={formatBarLabel} />
      </Bar>
    </BarChart>
  );

  return (
    <div className="card">
      <h3>Capacity Growth Modeling (Units per {shiftHours}-Hr Shift)</h3>
      {width ? (
        chart
      ) : (
        <div style={{ width: '100%', height }}>
          <ResponsiveContainer>{chart}</ResponsiveContainer>
        </div>
      )}
    </div>
  );
}
