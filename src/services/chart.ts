// src/services/chart.ts
import debug from 'debug'
import sharp from 'sharp'
import { parse, View } from 'vega'
import { compile, TopLevelSpec } from 'vega-lite'
import { describeError } from '../http/axiosClient'
import { isRecord, parseTradingPair } from '../schemas'
import { TimeWindow, TradingPair } from '../types'
import { toFixedEven } from '../utils/format'

const log = debug('alerts:chart')

export const CHART_WINDOWS: ReadonlyArray<{ key: TimeWindow; label: string }> = [
  { key: 'm5', label: '5 min' },
  { key: 'h1', label: '1 hour' },
  { key: 'h6', label: '6 hours' },
  { key: 'h24', label: '24 hours' }
]

const POSITIVE_COLOR = '#4CAF50'
const NEGATIVE_COLOR = '#F44336'
const VOLUME_COLOR = '#2196F3'
const BACKGROUND = '#1E1E2E'
const GRID = '#444'
const PRICE_SERIES = 'Price Change (%)'
const VOLUME_SERIES = 'Volume (USD)'
const SCALE = 2

export interface ChartPoint {
  window: string
  priceChange: number
  volume: number
  priceLabel: string
  volumeLabel: string
  // bar labels sit on top of positive bars and on the zero line for negative ones
  labelY: number
  barColor: string
}

// always one point per window, in window order; unusable values plot as 0
export function buildChartPoints(pair: TradingPair): ChartPoint[] {
  return CHART_WINDOWS.map(({ key, label }) => {
    let priceChange = pair.priceChange[key]
    let volume = pair.volume[key]
    if (priceChange === null || volume === null) {
      log('non-numeric data for window %s, plotting 0', key)
      priceChange = priceChange ?? 0
      volume = volume ?? 0
    }
    return {
      window: label,
      priceChange,
      volume,
      priceLabel: `${toFixedEven(priceChange, 1)}%`,
      volumeLabel: `$${toFixedEven(volume / 1000, 1)}K`,
      labelY: Math.max(priceChange, 0),
      barColor: priceChange >= 0 ? POSITIVE_COLOR : NEGATIVE_COLOR
    }
  })
}

export function buildChartSpec(points: ChartPoint[], tokenName: string): TopLevelSpec {
  return {
    $schema: 'https://vega.github.io/schema/vega-lite/v5.json',
    width: 640,
    height: 360,
    padding: { left: 50, right: 50, bottom: 50, top: 30 },
    background: BACKGROUND,
    title: { text: `Performance: ${tokenName}`, fontSize: 18, color: 'white', anchor: 'middle' },
    data: { values: points },
    encoding: {
      x: {
        field: 'window',
        type: 'nominal',
        sort: CHART_WINDOWS.map((w) => w.label),
        title: 'Time Window',
        axis: { labelAngle: 0, grid: false }
      }
    },
    layer: [
      {
        encoding: {
          y: { field: 'priceChange', type: 'quantitative', title: PRICE_SERIES, axis: { orient: 'left' } }
        },
        layer: [
          {
            mark: { type: 'bar' },
            encoding: {
              // per-bar sign color, taken as is
              fill: { field: 'barColor', type: 'nominal', scale: null },
              tooltip: [
                { field: 'window', type: 'nominal' },
                { field: 'priceChange', type: 'quantitative', title: PRICE_SERIES }
              ]
            }
          },
          {
            mark: { type: 'text', baseline: 'bottom', dy: -4, color: 'white' },
            encoding: {
              y: { field: 'labelY', type: 'quantitative' },
              text: { field: 'priceLabel', type: 'nominal' }
            }
          }
        ]
      },
      {
        encoding: {
          y: {
            field: 'volume',
            type: 'quantitative',
            title: VOLUME_SERIES,
            axis: { orient: 'right', grid: false }
          }
        },
        layer: [
          {
            mark: { type: 'line', strokeWidth: 3, point: { filled: true, size: 100 } },
            transform: [{ calculate: `'${VOLUME_SERIES}'`, as: 'series' }],
            encoding: {
              // the only color channel, so its legend lists both series
              color: {
                field: 'series',
                type: 'nominal',
                scale: { domain: [PRICE_SERIES, VOLUME_SERIES], range: [POSITIVE_COLOR, VOLUME_COLOR] },
                legend: { orient: 'top', direction: 'horizontal', title: null }
              },
              tooltip: [
                { field: 'window', type: 'nominal' },
                { field: 'volumeLabel', type: 'nominal', title: VOLUME_SERIES }
              ]
            }
          },
          {
            mark: { type: 'text', baseline: 'bottom', dy: -10, color: VOLUME_COLOR },
            encoding: { text: { field: 'volumeLabel', type: 'nominal' } }
          }
        ]
      }
    ],
    resolve: { scale: { y: 'independent' } },
    config: {
      view: { stroke: null },
      font: 'sans-serif',
      axis: {
        labelColor: 'white',
        titleColor: 'white',
        gridColor: GRID,
        domainColor: GRID,
        tickColor: GRID
      },
      legend: { labelColor: 'white' }
    }
  }
}

// headless render of a chart spec to SVG markup at 2x
export async function renderChartSvg(spec: TopLevelSpec): Promise<string> {
  const view = new View(parse(compile(spec).spec), { renderer: 'none' })
  try {
    return await view.toSVG(SCALE)
  } finally {
    view.finalize()
  }
}

/**
 * Renders the price-change / volume chart for a pair to PNG (2x scale).
 * Resolves to null when the pair is unusable or rendering fails, so callers
 * fall back to a text-only alert.
 */
export async function renderChart(pair: unknown, tokenName: string): Promise<Buffer | null> {
  if (!isRecord(pair)) {
    // eslint-disable-next-line no-console
    console.error('renderChart: invalid pair data')
    return null
  }

  try {
    const svg = await renderChartSvg(buildChartSpec(buildChartPoints(parseTradingPair(pair)), tokenName))
    const png = await sharp(Buffer.from(svg)).png().toBuffer()
    log('rendered chart for %s (%d bytes)', tokenName, png.length)
    return png
  } catch (e: unknown) {
    // eslint-disable-next-line no-console
    console.error('renderChart error', describeError(e))
    return null
  }
}
