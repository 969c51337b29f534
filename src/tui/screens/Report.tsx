import React from 'react';
import { Box, Text } from 'ink';
import type { SeasonReport } from '../../core/validation.js';
import { Panel, type PanelTone } from '../components/Panel.js';
import { formatDelta, formatMae, formatPValue, formatStatistic } from '../format.js';
import { theme } from '../theme.js';

const MAX_FAILURES = 6;

export type ReportEventRow = {
  eventId: string;
  format: string;
  baselineMae: number | null;
  candidateMae: number | null;
  trustScale: number | null;
};

export function listReportEvents(report: SeasonReport): ReportEventRow[] {
  const { baseline, candidate } = report.comparison;
  const baselineErrors = new Map(
    baseline.result.perEventErrors.map((entry) => [entry.eventId, entry.mae]),
  );
  return candidate.result.perEventErrors.map((entry) => ({
    eventId: entry.eventId,
    format: entry.format,
    baselineMae: baselineErrors.get(entry.eventId) ?? null,
    candidateMae: entry.mae,
    trustScale: candidate.trustScales.get(entry.eventId) ?? null,
  }));
}

export function comparisonVerdict(report: SeasonReport): { tone: PanelTone; note: string } {
  const baselineMae = report.comparison.baseline.result.aggregateMae;
  const candidateMae = report.comparison.candidate.result.aggregateMae;
  if (baselineMae === null || candidateMae === null) {
    return { tone: 'muted', note: 'no paired events' };
  }
  if (candidateMae < baselineMae) return { tone: 'better', note: 'candidate ahead' };
  if (candidateMae > baselineMae) return { tone: 'worse', note: 'baseline ahead' };
  return { tone: 'accent', note: 'level' };
}

function deltaColor(delta: number | null) {
  if (delta === null || delta === 0) return theme.muted;
  return delta > 0 ? theme.status.worse : theme.status.better;
}

export function Report({
  report,
  selected,
}: {
  report: SeasonReport;
  selected: number;
}): React.JSX.Element {
  const { baseline, candidate, significance } = report.comparison;
  const events = listReportEvents(report);
  const failures = report.failures.slice(0, MAX_FAILURES);
  const verdict = comparisonVerdict(report);

  return (
    <Box flexDirection="column" gap={1}>
      <Box gap={1}>
        <Panel
          title="Method comparison"
          note={verdict.note}
          tone={verdict.tone}
          boxProps={{ flexGrow: 1 }}
        >
          <Text>
            {baseline.result.methodLabel}: {formatMae(baseline.result.aggregateMae)}
          </Text>
          <Text>
            {candidate.result.methodLabel}: {formatMae(candidate.result.aggregateMae)}
          </Text>
          <Text color={theme.muted}>{`${events.length} events evaluated`}</Text>
        </Panel>
        <Panel title="Paired t-test" boxProps={{ flexGrow: 1 }}>
          <Text>{`mean improvement ${formatMae(significance.meanDifference)}`}</Text>
          <Text>
            {`t ${formatStatistic(significance.tStatistic)} (df ${significance.degreesOfFreedom ?? 'n/a'})`}
          </Text>
          <Text>{`p ${formatPValue(significance.pValue)}`}</Text>
          <Text>{`effect size ${formatStatistic(significance.effectSize)}`}</Text>
        </Panel>
        <Panel title="Weekend format" boxProps={{ flexGrow: 1 }}>
          {(['standard', 'sprint'] as const).map((format) => (
            <Text key={format}>
              {`${format}: ${formatMae(report.segments.baseline[format].aggregateMae)} → ${formatMae(
                report.segments.candidate[format].aggregateMae,
              )} (${report.segments.candidate[format].events})`}
            </Text>
          ))}
        </Panel>
      </Box>
      <Box gap={1}>
        <Panel title="Ablation (MAE change without category)" boxProps={{ flexGrow: 1 }}>
          {report.ablation.length === 0 ? (
            <Text color={theme.muted}>Nothing to ablate</Text>
          ) : (
            report.ablation.map((entry) => (
              <Box key={entry.category} gap={1}>
                <Text>{entry.category}</Text>
                <Text color={deltaColor(entry.maeDelta)}>{formatDelta(entry.maeDelta)}</Text>
              </Box>
            ))
          )}
        </Panel>
        <Panel title="Events" boxProps={{ flexGrow: 2 }}>
          {events.length === 0 ? (
            <Text color={theme.muted}>No event could be evaluated</Text>
          ) : (
            events.map((row, index) => (
              <Text
                key={row.eventId}
                color={index === selected ? theme.accent : undefined}
              >
                {`${index === selected ? '›' : ' '} ${row.eventId} (${row.format}) ${formatMae(
                  row.baselineMae,
                )} → ${formatMae(row.candidateMae)}  γ ${row.trustScale ?? 'n/a'}`}
              </Text>
            ))
          )}
        </Panel>
      </Box>
      {failures.length > 0 ? (
        <Panel title={`Failures (${report.failures.length})`} tone="muted">
          {failures.map((failure) => (
            <Text
              key={`${failure.eventId ?? ''}:${failure.id}:${failure.code}`}
              color={theme.status.error}
            >
              {`${failure.code} ${failure.eventId ?? failure.id}: ${failure.message}`}
            </Text>
          ))}
          {report.failures.length > MAX_FAILURES ? (
            <Text color={theme.muted}>
              {`+${report.failures.length - MAX_FAILURES} more in the log`}
            </Text>
          ) : null}
        </Panel>
      ) : null}
    </Box>
  );
}
