import React from 'react';
import { Text } from 'ink';
import { theme } from '../theme.js';

export function FooterHints({ screen }: { screen: string }): React.JSX.Element {
  if (screen === 'event') {
    return (
      <Text color={theme.muted}>
        ←/→ previous/next event · b/backspace/esc back · q quit
      </Text>
    );
  }
  if (screen === 'report') {
    return (
      <Text color={theme.muted}>
        ↑/↓ select event · enter event grid · q quit
      </Text>
    );
  }
  return <Text color={theme.muted}>q quit</Text>;
}
