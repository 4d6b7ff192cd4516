// packages/cli/src/chart.ts

import { writeFileSync } from 'node:fs';
import type { CalculationMode, SweepResults, TermResult, TermResults } from '@credit-terms/engine';
import { InputError } from './input';

export const CHART_JS_URL = 'https://cdn.jsdelivr.net/npm/chart.js@4.4.1/dist/chart.umd.min.js';

type Metric = Exclude<keyof TermResult, 'investmentBalance'>;

interface Dataset {
  label: string;
  data: number[];
  borderWidth: number;
  pointRadius: number;
  tension: number;
  borderColor: string;
  borderDash?: number[];
  fill: boolean;
}

export interface ChartConfig {
  type: 'line';
  data: { labels: number[]; datasets: Dataset[] };
  options: {
    responsive: boolean;
    animation: boolean;
    interaction: { mode: 'index'; intersect: boolean };
    scales: {
      x: { title: { display: boolean; text: string } };
      y: { title: { display: boolean; text: string } };
    };
    plugins: { title: { display: boolean; text: string }; legend: { display: boolean } };
  };
}

const MODES: Record<CalculationMode, { label: string; color: string }> = {
  plain: { label: 'Credit', color: 'rgb(239,68,68)' },
  overpayment: { label: 'Credit with overpayment', color: 'rgb(34,197,94)' },
  investment: { label: 'Credit with investment', color: 'rgb(59,130,246)' },
};

const METRICS: { metric: Metric; title: string; axis: string }[] = [
  { metric: 'monthlyPayment', title: 'Monthly Payment vs Years', axis: 'Monthly payment' },
  { metric: 'totalCost', title: 'Total Cost vs Years', axis: 'Total cost' },
  { metric: 'totalCostAdjusted', title: 'Inflation-Adjusted Cost vs Years', axis: 'Inflation-adjusted cost' },
];

const line = (label: string, data: number[], borderColor: string): Dataset =>
  ({ label, data, borderWidth: 2, pointRadius: 0, tension: .15, borderColor, fill: false });

function availableModes(sweep: SweepResults): [CalculationMode, TermResults][] {
  const modes: [CalculationMode, TermResults][] = [['plain', sweep.plain]];
  if (sweep.overpayment) modes.push(['overpayment', sweep.overpayment]);
  if (sweep.investment) modes.push(['investment', sweep.investment]);
  return modes;
}

/**
 * One line chart per metric, one dataset per calculated mode. The acceptable
 * payment is drawn as a flat reference on the monthly payment chart.
 */
export function buildChartConfigs(sweep: SweepResults, acceptablePayment?: number): ChartConfig[] {
  const labels = [...sweep.plain.keys()];
  return METRICS.map(({ metric, title, axis }): ChartConfig => {
    const datasets = availableModes(sweep).map(([mode, results]) =>
      line(MODES[mode].label, [...results.values()].map((r) => r[metric]), MODES[mode].color));
    if (metric === 'monthlyPayment' && acceptablePayment !== undefined) {
      datasets.push({
        ...line('Acceptable monthly payment', labels.map(() => acceptablePayment), 'rgba(100,116,139,.8)'),
        borderDash: [6, 4],
      });
    }
    return {
      type: 'line',
      data: { labels, datasets },
      options: {
        responsive: true, animation: false, interaction: { mode: 'index', intersect: false },
        scales: { x: { title: { display: true, text: 'Loan term (years)' } },
                  y: { title: { display: true, text: axis } } },
        plugins: { title: { display: true, text: title }, legend: { display: true } },
      },
    };
  });
}

// Keeps a `</script>` inside the data from closing the tag.
const embed = (value: unknown) => JSON.stringify(value).replace(/</g, '\\u003c');

export function buildChartPage(sweep: SweepResults, acceptablePayment?: number): string {
  const configs = buildChartConfigs(sweep, acceptablePayment);
  const canvases = configs.map((_, i) => `  <div class="chart"><canvas id="chart-${i}"></canvas></div>`).join('\n');
  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>Credit term comparison</title>
  <style>body{font-family:sans-serif;margin:2rem}.chart{max-width:960px;margin-bottom:2rem}</style>
  <script src="${CHART_JS_URL}"></script>
</head>
<body>
${canvases}
  <script>
    const configs = ${embed(configs)};
    configs.forEach((config, i) => new Chart(document.getElementById('chart-' + i), config));
  </script>
</body>
</html>
`;
}

export function writeChartPage(filepath: string, sweep: SweepResults, acceptablePayment?: number): void {
  try {
    writeFileSync(filepath, buildChartPage(sweep, acceptablePayment), 'utf8');
  } catch (error) {
    throw new InputError(`Failed to write the chart page ${filepath}: ${error instanceof Error ? error.message : String(error)}`);
  }
}
