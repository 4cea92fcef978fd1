import {
  LineChart,
  Line,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  ReferenceLine,
  ResponsiveContainer,
} from 'recharts';
import type { TrendPoint } from '../lib/types';

interface Props {
  points: TrendPoint[];
  criticalLimit: number;
  /** Fixed pixel width; omit to fill the card. */
  width?: number;
  height?: number;
  animate?: boolean;
}

export function TrendChart({ points, criticalLimit, width, height = 300, animate = true }: Props) {
  const chart = (
    <LineChart data={points} width={width} height={height}>
      <CartesianGrid strokeDasharray="3 3" />
      <XAxis dataKey="hour" />
      <YAxis label={{ value: 'Cycle Time (s)', angle: -90, position: 'insideLeft' }} />
      <Tooltip />
      <ReferenceLine
        y={criticalLimit}
        ifOverflow="extendDomain"
        stroke="red"
        strokeDasharray="6 4"
        label="Critical Limit"
      />
      <Line
        type="monotone"
        dataKey="cycleTimeSeconds"
        name="Cycle Time (s)"
        stroke="#3d2b1f"
        dot
        isAnimationActive={animate}
      />
    </LineChart>
  );

  return (
    <div className="card">
      <h3>Shift Cycle Time: Detecting Worker Fatigue</h3>
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
