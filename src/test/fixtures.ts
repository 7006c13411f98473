import type { Dataset, DataRow } from '../types'

// Mutually orthogonal, zero-sum ±1 patterns of period 4, so correlations are exact
const SIGNAL = [1, -1, 1, -1]
const NOISE = [1, 1, -1, -1]
const OTHER = [1, -1, -1, 1]
const REGIONS = ['north', 'south', 'east', 'west']

/**
 * 100 rows × 5 columns: x, y, z numeric; region, label categorical.
 * corr(x, y) = 1 / sqrt(1.49) ≈ 0.819, z is uncorrelated with both.
 * region is missing on rows 10–19; rows 98 and 99 repeat rows 94 and 95.
 */
export function makeSurveyDataset(): Dataset {
  const rows: DataRow[] = []
  for (let i = 0; i < 100; i++) {
    const p = i % 4
    const source = i === 98 ? 94 : i === 99 ? 95 : i
    rows.push({
      x: 10 + SIGNAL[p],
      y: 50 + SIGNAL[p] + 0.7 * NOISE[p],
      z: 5 + OTHER[p],
      region: i >= 10 && i < 20 ? null : REGIONS[p],
      label: `item-${source}`,
    })
  }
  return { columns: ['x', 'y', 'z', 'region', 'label'], rows }
}
