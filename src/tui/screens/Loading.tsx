import React, { useEffect, useState } from 'react';
import { Box, Text } from 'ink';
import { Panel } from '../components/Panel.js';
import { theme } from '../theme.js';

const SPINNER_FRAMES = ['|', '/', '-', '\\'];

function Spinner() {
  const [index, setIndex] = useState(0);
  useEffect(() => {
    const id = setInterval(
      () => setIndex((current) => (current + 1) % SPINNER_FRAMES.length),
      80,
    );
    return () => clearInterval(id);
  }, []);
  return <Text color={theme.status.working}>{SPINNER_FRAMES[index]}</Text>;
}

export function Loading({ message, source }: { message: string; source: string }) {
  return (
    <Panel title="Season">
      <Box flexDirection="column" gap={1}>
        <Box gap={1}>
          <Spinner />
          <Text>{message}</Text>
        </Box>
        <Text color={theme.muted}>{source}</Text>
      </Box>
    </Panel>
  );
}
