import React from 'react';
import { Box, Text, type BoxProps } from 'ink';
import { theme } from '../theme.js';

// `better` and `worse` mark a panel whose contents favour one method.
export type PanelTone = 'neutral' | 'accent' | 'muted' | 'better' | 'worse';

type PanelProps = {
  title: string;
  // shown after the title, e.g. a verdict
  note?: string;
  children: React.ReactNode;
  tone?: PanelTone;
  paddingX?: number;
  boxProps?: BoxProps;
};

const BORDER_COLORS: Record<PanelTone, string> = {
  neutral: theme.border,
  accent: theme.accent,
  muted: theme.muted,
  better: theme.status.better,
  worse: theme.status.worse,
};

export function Panel({
  title,
  note,
  children,
  tone = 'neutral',
  paddingX = 1,
  boxProps,
}: PanelProps): React.JSX.Element {
  const borderColor = BORDER_COLORS[tone];
  const titleColor = tone === 'neutral' || tone === 'muted' ? theme.panelTitle : borderColor;

  return (
    <Box
      flexDirection="column"
      borderStyle="round"
      borderColor={borderColor}
      paddingX={paddingX}
      {...boxProps}
    >
      <Box gap={1}>
        <Text color={titleColor}>{title}</Text>
        {note ? <Text color={theme.muted}>{note}</Text> : null}
      </Box>
      <Box flexDirection="column" marginTop={1}>
        {children}
      </Box>
    </Box>
  );
}
