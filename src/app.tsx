import React, { useEffect, useMemo, useState } from 'react';
import { Box, Text, useInput, useStdout } from 'ink';
import type { CliArgs } from './cli-args.js';
import { readModelConfig } from './core/config.js';
import { loadSeasonDataset } from './core/dataset.js';
import { formatUnknownError } from './core/errors.js';
import { createPaceLogger } from './core/pace-logger.js';
import { runSeason } from './core/season-run.js';
import type { SeasonDataset } from './core/types.js';
import { getDataDir } from './core/xdg.js';
import { FooterHints } from './tui/components/FooterHints.js';
import { Header } from './tui/components/Header.js';
import { Panel } from './tui/components/Panel.js';
import { getBackScreen, stepIndex, type Screen } from './tui/navigation.js';
import { EventGrid } from './tui/screens/EventGrid.js';
import { Loading } from './tui/screens/Loading.js';
import { listReportEvents, Report } from './tui/screens/Report.js';
import { theme } from './tui/theme.js';

const APP_NAME = 'pacecast';

export function App({ args }: { args: CliArgs }): React.JSX.Element {
  const [screen, setScreen] = useState<Screen>({
    name: 'loading',
    message: 'Loading configuration...',
  });
  const [dataset, setDataset] = useState<SeasonDataset | null>(null);
  const [methodLabel, setMethodLabel] = useState<string | null>(null);
  const paceLogger = useMemo(() => createPaceLogger({ dataDir: getDataDir(APP_NAME) }), []);
  const { stdout } = useStdout();
  const terminalRows = stdout?.rows ?? 40;
  const isShort = terminalRows < 32;

  useEffect(() => {
    let cancelled = false;
    void (async () => {
      try {
        const config = await readModelConfig(APP_NAME);
        if (cancelled) return;
        setScreen({ name: 'loading', message: 'Reading season dataset...' });
        const loaded = await loadSeasonDataset(args.datasetPath);
        if (cancelled) return;
        setScreen({ name: 'loading', message: `Evaluating ${loaded.events.length} events...` });
        // The evaluation is synchronous; let Ink paint the message first.
        await new Promise<void>((resolve) => setImmediate(resolve));
        if (cancelled) return;
        const run = runSeason(config, loaded, {
          method: args.method,
          regulation: args.regulation,
          logger: paceLogger.logger,
        });
        if (cancelled) return;
        setDataset(loaded);
        setMethodLabel(`${run.method.kind} · ${run.config.regulationState} regulations`);
        setScreen({ name: 'report', report: run.report, selected: 0 });
      } catch (err) {
        if (!cancelled) setScreen({ name: 'error', message: formatUnknownError(err) });
      }
    })();
    return () => {
      cancelled = true;
    };
  }, [args.datasetPath, args.method, args.regulation, paceLogger]);

  const eventCount = useMemo(
    () => (screen.name === 'report' || screen.name === 'event' ? listReportEvents(screen.report).length : 0),
    [screen],
  );

  useInput((input, key) => {
    if (input === 'q') process.exit(0);
    if (screen.name === 'report') {
      if (key.upArrow || key.downArrow) {
        setScreen({
          ...screen,
          selected: stepIndex(screen.selected, key.upArrow ? -1 : 1, eventCount),
        });
        return;
      }
      if (key.return && eventCount > 0) {
        setScreen({ ...screen, name: 'event' });
      }
      return;
    }
    if (screen.name === 'event' && (key.leftArrow || key.rightArrow)) {
      setScreen({
        ...screen,
        selected: stepIndex(screen.selected, key.leftArrow ? -1 : 1, eventCount),
      });
      return;
    }
    if (input === 'b' || key.backspace || key.escape) {
      const next = getBackScreen(screen);
      if (next) setScreen(next);
    }
  });

  const breadcrumb = [
    dataset ? `Season ${dataset.season}` : args.datasetPath,
    ...(methodLabel ? [methodLabel] : []),
  ];

  const renderEvent = () => {
    if (screen.name !== 'event' || !dataset) return null;
    const row = listReportEvents(screen.report)[screen.selected];
    const event = dataset.events.find((candidate) => candidate.eventId === row?.eventId);
    if (!row || !event) return null;
    return (
      <EventGrid
        event={event}
        prediction={screen.report.comparison.candidate.predictions.get(row.eventId)}
      />
    );
  };

  return (
    <Box flexDirection="column">
      <Header breadcrumb={breadcrumb} compact={isShort} />
      <Box flexGrow={1} flexDirection="column" marginLeft={1}>
        {screen.name === 'loading' && (
          <Loading message={screen.message} source={args.datasetPath} />
        )}
        {screen.name === 'error' && (
          <Panel title="Run failed" tone="muted">
            <Text color={theme.status.error}>{screen.message}</Text>
            <Text color={theme.muted}>{`Log: ${paceLogger.logPath}`}</Text>
          </Panel>
        )}
        {screen.name === 'report' && (
          <Report report={screen.report} selected={screen.selected} />
        )}
        {renderEvent()}
      </Box>
      <FooterHints screen={screen.name} />
    </Box>
  );
}
