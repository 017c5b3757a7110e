import axios from 'axios';
import { WorkerReportEntry } from './core/Monitor';
import { JobState } from './core/types';

export interface StatsSnapshot {
  depth: Record<JobState, number>;
  liveWorkers: number;
  workers: WorkerReportEntry[];
}

const STATUS_ICON: Record<WorkerReportEntry['status'], string> = {
  idle: '⚪',
  busy: '🟢',
  dead: '🔴',
};

/**
 * Renders a stats snapshot as a plain-text box for terminals.
 */
export function formatReport(stats: StatsSnapshot): string {
  const { depth } = stats;
  const output: string[] = [];

  output.push('┌──────────────────── QUEUE STATUS ────────────────────┐');
  output.push(
    `│ waiting ${depth.waiting} | delayed ${depth.delayed} | active ${depth.active} | completed ${depth.completed} | failed ${depth.failed}`
  );
  output.push('├──────────────────────── WORKERS ─────────────────────┤');

  if (stats.workers.length === 0) {
    output.push('│ (no workers registered)');
  }
  for (const worker of stats.workers) {
    output.push(
      `│ ${STATUS_ICON[worker.status]} ${worker.id.padEnd(24)} ${worker.status.padEnd(5)} last heartbeat ${worker.secondsSinceHeartbeat}s ago`
    );
  }

  output.push(`│ live workers: ${stats.liveWorkers}/${stats.workers.length}`);
  output.push('└──────────────────────────────────────────────────────┘');
  return output.join('\n');
}

async function main() {
  const baseUrl = process.argv[2] ?? process.env.QUEUE_API_URL ?? 'http://localhost:3000/api/queue';
  const response = await axios.get<StatsSnapshot>(`${baseUrl}/stats`);
  console.log(formatReport(response.data));
}

if (require.main === module) {
  main().catch((error) => {
    console.error(`[REPORT] Could not fetch stats: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
}
