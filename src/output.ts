import type { CliError } from './errors.js';
import type { TaskSummary } from './vcd/task.js';
import type { NetworkSummary } from './vcd/types.js';

export interface OutputSink {
  task(task: TaskSummary): void;
  message(text: string): void;
  records(rows: NetworkSummary[]): void;
  error(error: CliError): void;
  /** Raw writers, shared with the argument parser's own help and usage output. */
  writeOut(text: string): void;
  writeErr(text: string): void;
}

export interface OutputStreams {
  writeOut(text: string): void;
  writeErr(text: string): void;
}

export const processStreams: OutputStreams = {
  writeOut: (text) => process.stdout.write(text),
  writeErr: (text) => process.stderr.write(text),
};

/** Simple table formatter for terminal output. */
export function table(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? '').length)));

  const sep = widths.map((w) => '-'.repeat(w)).join('  ');
  const formatRow = (cells: string[]) =>
    cells
      .map((c, i) => (c ?? '').padEnd(widths[i] ?? 0))
      .join('  ')
      .trimEnd();

  return [formatRow(headers), sep, ...rows.map(formatRow)].join('\n');
}

function taskLines(task: TaskSummary): Array<[string, string]> {
  const rows: Array<[string, string]> = [
    ['id', task.id],
    ['name', task.name],
    ['operation', task.operation],
    ['operationName', task.operationName],
    ['status', task.status],
  ];
  if (task.owner) rows.push(['owner', task.owner]);
  if (task.startTime) rows.push(['startTime', task.startTime]);
  return rows;
}

export class ConsoleOutput implements OutputSink {
  constructor(
    private readonly options: { json: boolean },
    private readonly streams: OutputStreams = processStreams
  ) {}

  task(task: TaskSummary): void {
    if (this.options.json) {
      this.writeOut(JSON.stringify(task) + '\n');
      return;
    }
    const rows = taskLines(task);
    const width = Math.max(...rows.map(([key]) => key.length));
    this.writeOut(rows.map(([key, value]) => `${key.padEnd(width)}  ${value}`).join('\n') + '\n');
  }

  message(text: string): void {
    this.writeOut((this.options.json ? JSON.stringify({ message: text }) : text) + '\n');
  }

  records(rows: NetworkSummary[]): void {
    if (this.options.json) {
      this.writeOut(JSON.stringify(rows) + '\n');
      return;
    }
    if (rows.length === 0) {
      this.writeOut('No networks found.\n');
      return;
    }
    this.writeOut(table(['name'], rows.map((row) => [row.name])) + '\n');
  }

  error(error: CliError): void {
    if (this.options.json) {
      this.writeErr(JSON.stringify({ error: error.message, kind: error.kind, ...error.details }) + '\n');
      return;
    }
    const line = error.message.split('\n')[0] ?? error.message;
    this.writeErr(`Error: ${line}\n`);
  }

  writeOut(text: string): void {
    this.streams.writeOut(text);
  }

  writeErr(text: string): void {
    this.streams.writeErr(text);
  }
}
