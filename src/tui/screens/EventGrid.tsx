import React from 'react';
import { Box, Text } from 'ink';
import type { EventPrediction } from '../../core/pipeline.js';
import type { EventData } from '../../core/types.js';
import { Panel } from '../components/Panel.js';
import { formatPace } from '../format.js';
import { theme } from '../theme.js';

export function EventGrid({
  event,
  prediction,
}: {
  event: EventData;
  prediction: EventPrediction | undefined;
}): React.JSX.Element {
  if (!prediction) {
    return (
      <Panel title={event.name ?? event.eventId}>
        <Text color={theme.muted}>This event was not evaluated.</Text>
      </Panel>
    );
  }
  const sessions = prediction.plan.steps
    .map((step) => `${step.sessionId} λ${step.trustWeight.toFixed(2)}`)
    .join(' → ');

  return (
    <Panel title={`${event.name ?? event.eventId} · ${prediction.plan.format}`} tone="accent">
      <Text color={theme.muted}>{sessions || 'No evidence sessions'}</Text>
      <Box flexDirection="column" marginTop={1}>
        {prediction.ranking.map((entry) => {
          const actual = event.qualifying[entry.competitorId];
          return (
            <Box key={entry.competitorId} gap={2}>
              <Text>{`P${entry.position}`.padEnd(4)}</Text>
              <Text bold>{entry.competitorId.padEnd(6)}</Text>
              <Text>{formatPace(entry.mean, entry.interval)}</Text>
              <Text color={theme.muted}>{`${entry.observations} obs`}</Text>
              <Text color={actual === entry.position ? theme.status.ok : theme.muted}>
                {actual === undefined ? 'Q n/a' : `Q${actual}`}
              </Text>
            </Box>
          );
        })}
      </Box>
    </Panel>
  );
}
