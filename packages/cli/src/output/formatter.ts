import type { Exchange, Message } from '@refract/shared';
import type {
  ArticleResult,
  ReflectResult,
  SanitizeResult,
  SmokeReport,
  SummarizeResult,
  TraceSnapshots,
} from '@refract/core';

export function formatExchangeHeader(exchange: Exchange): string {
  const latency = exchange.latencyMs === null ? 'n/a' : `${exchange.latencyMs}ms`;
  return [
    `Task ${exchange.taskId}`,
    `verdict: ${exchange.verdict ?? 'none'}`,
    `latency: ${latency}`,
    `tokens: ${exchange.costTokensPrompt} prompt / ${exchange.costTokensOutput} output`,
  ].join(' | ');
}

export function formatMessage(message: Message): string {
  const tool = message.toolName ? ` (${message.toolName})` : '';
  return `[${message.role}] ${message.sender}${tool}: ${message.content}`;
}

export function formatExchange(exchange: Exchange): string {
  const lines = [formatExchangeHeader(exchange)];
  for (const message of exchange.messages) {
    lines.push(indent(formatMessage(message)));
  }
  return lines.join('\n');
}

export function formatTraceFile(snapshots: TraceSnapshots): string {
  const lines = [snapshots.path];
  for (const exchange of snapshots.exchanges) {
    lines.push(`  ${formatExchangeHeader(exchange)}`);
  }
  if (snapshots.skipped > 0) {
    lines.push(`  (${snapshots.skipped} unreadable line${snapshots.skipped === 1 ? '' : 's'} skipped)`);
  }
  return lines.join('\n');
}

export function formatSummarizeResult(result: SummarizeResult): string {
  return [
    section('Summary', result.summary),
    section('Validation', result.validation),
    formatExchangeHeader(result.exchange),
  ].join('\n\n');
}

export function formatArticleResult(result: ArticleResult): string {
  const parts = [section('Draft Article', result.draft), section('Refined Article', result.refined)];
  if (result.reflection) {
    parts.push(section(
      `Reviewed Article (${result.reflection.verdict}, ${result.reflection.revisionCalls} revision(s))`,
      result.final,
    ));
  }
  parts.push(section('Validation', result.validation), formatExchangeHeader(result.exchange));
  return parts.join('\n\n');
}

export function formatSanitizeResult(result: SanitizeResult): string {
  return [
    section('Sanitized Data', result.sanitized),
    section('Validation', result.validation),
    formatExchangeHeader(result.exchange),
  ].join('\n\n');
}

export function formatReflectResult(result: ReflectResult): string {
  return [
    section('Final Draft', result.draft),
    `Critiques: ${result.critiqueCalls} | Revisions: ${result.revisionCalls}`,
    formatExchangeHeader(result.exchange),
  ].join('\n\n');
}

export function formatSmokeReport(report: SmokeReport): string {
  const lines: string[] = [];
  report.results.forEach((result, index) => {
    lines.push(`Test ${index + 1}/${report.total}: ${result.name}`);
    if (result.error !== undefined) {
      lines.push(`  [ERROR] ${result.error}`);
    } else if (result.passed) {
      lines.push('  [PASS]');
    } else {
      for (const failure of result.failures) {
        lines.push(`  [FAIL] ${failure}`);
      }
    }
  });
  lines.push('');
  lines.push(`${report.passed}/${report.total} tests passed.`);
  return lines.join('\n');
}

function section(title: string, body: string): string {
  return `--- ${title} ---\n${body}`;
}

function indent(text: string): string {
  return text.split('\n').map(line => `  ${line}`).join('\n');
}
