import { EventAnalysis } from '../types';
import { ScanEventResult, WeatherScanResult } from './scanner';
import { toFahrenheit } from './probability';

function formatAnalysis(analysis: EventAnalysis): string[] {
  const lines: string[] = [];
  const { longs, blanket, shorts, portfolio } = analysis;

  if (longs.length > 0) {
    lines.push(`  -> Found ${longs.length} +EV 'Bet YES' opportunities:`);
    for (const rec of longs) {
      lines.push(`     * [${rec.bucketLabel}] Price: ${rec.price} | Model Prob: ${rec.probability.toFixed(2)} | EV: ${rec.ev.toFixed(4)}`);
    }
  }

  if (blanket) {
    lines.push('  -> RECOMMENDED STRATEGY: Blanket Coverage');
    lines.push(`     Covering buckets: ${blanket.buckets.join(', ')}`);
    lines.push(`     Total Cost: ${blanket.totalCost.toFixed(3)} | Total Prob: ${blanket.totalProbability.toFixed(2)}`);
    lines.push(`     Total EV: ${blanket.totalEv.toFixed(4)} (ROI: ${blanket.roiLabel})`);
  }

  if (shorts.length > 0) {
    lines.push(`  -> Found ${shorts.length} 'Bet NO' (Short) opportunities:`);
    for (const rec of shorts) {
      lines.push(`     * [${rec.bucketLabel}] Sell YES at: ${rec.impliedYesPrice} (Cost to NO: ${rec.price.toFixed(3)})`);
      lines.push(`       Model says YES prob is ${rec.probabilityYes.toFixed(3)} -> EV: ${rec.ev.toFixed(4)}`);
    }
  }

  if (portfolio) {
    lines.push('  -> PORTFOLIO ANALYSIS (Combined Shorts):');
    lines.push(`     Combined Prob of Profit: ${(portfolio.combinedProbProfit * 100).toFixed(1)}%`);
    lines.push(`     Expected Total Return: ${portfolio.expectedTotalReturn.toFixed(3)}`);
    lines.push('     Recommended Sizing (Fractional Kelly):');
    for (const alloc of portfolio.allocations) {
      lines.push(`       - ${alloc.bucketLabel}: ${alloc.kellyPct.toFixed(1)}% bankroll ($${alloc.amount.toFixed(1)})`);
    }
  }

  if (longs.length === 0 && !blanket && shorts.length === 0) {
    lines.push('  -> No significant +EV plays found.');
  }

  return lines;
}

export function formatEventReport(result: ScanEventResult): string {
  if (result.status === 'skipped') {
    return `[SKIP] ${result.title}: ${result.reason}`;
  }

  const { forecast } = result;
  const lines = [
    `Analyzing Event: ${result.title}`,
    `  -> Location: ${result.city}, Date: ${result.date}`,
    `  -> Forecast Max: ${forecast.maxTemp}C (${toFahrenheit(forecast.maxTemp).toFixed(1)}F)`,
    ...formatAnalysis(result.analysis),
  ];
  return lines.join('\n');
}

export function formatScanReport(result: WeatherScanResult): string {
  if (result.events.length === 0) {
    return 'No active weather events found.';
  }

  const sections = [`Found ${result.events.length} events to analyze.`];
  for (const event of result.events) {
    sections.push(formatEventReport(event));
    sections.push('-'.repeat(30));
  }
  return sections.join('\n');
}
