import type { FacilityConfig, LiveInputs } from '../lib/types';
import './styles.css';

interface Props {
  config: FacilityConfig;
  inputs: LiveInputs;
  onChange: (next: LiveInputs) => void;
}

/** Sidebar controls. Values are passed through raw; the decision layer validates them. */
export function LiveInputsPanel({ config, inputs, onChange }: Props) {
  const ranges = config.inputs;
  const unit = config.inventory.unit;

  // an emptied field is missing, not zero
  const set = (key: keyof LiveInputs, raw: string) =>
    onChange({ ...inputs, [key]: raw.trim() === '' ? Number.NaN : Number(raw) });

  return (
    <aside className="sidebar">
      <h2>Live Operations Input</h2>
      <div className="small">Update these values from real-time floor data.</div>

      <label>
        Current Stock ({unit})
        <input
          type="number"
          min={ranges.currentStock.min}
          step={ranges.currentStock.step}
          value={Number.isFinite(inputs.currentStock) ? inputs.currentStock : ''}
          onChange={(e) => set('currentStock', e.target.value)}
        />
      </label>

      <label>
        Current Cycle Time (sec): <b>{inputs.cycleTimeSeconds}</b>
        <input
          type="range"
          min={ranges.cycleTimeSeconds.min}
          max={ranges.cycleTimeSeconds.max}
          step={ranges.cycleTimeSeconds.step}
          value={inputs.cycleTimeSeconds}
          onChange={(e) => set('cycleTimeSeconds', e.target.value)}
        />
      </label>

      <label>
        Defect Rate (%): <b>{inputs.defectRatePct.toFixed(1)}</b>
        <input
          type="range"
          min={ranges.defectRatePct.min}
          max={ranges.defectRatePct.max}
          step={ranges.defectRatePct.step}
          value={inputs.defectRatePct}
          onChange={(e) => set('defectRatePct', e.target.value)}
        />
      </label>
    </aside>
  );
}
