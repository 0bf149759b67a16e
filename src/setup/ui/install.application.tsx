import path from 'node:path';

import { Box, Text, useApp, useInput } from 'ink';
import { useEffect, useRef, useState } from 'react';

import { expandArchive } from '@/setup/archive';
import { createFetchDownloader } from '@/setup/download';
import { errorMessage } from '@/setup/errors';
import { resolveInstallDirectory } from '@/setup/paths';
import { runInstall } from '@/setup/pipeline';
import { createReporter, formatWarning } from '@/setup/reporter';
import type { InstallContext, InstallEvent, InstallSummary, InstallWarning } from '@/setup/types';

type Stage = 'running' | 'summary' | 'fatal';

type InstallApplicationProps = {
  context: InstallContext;
  onComplete: (code: number) => void;
};

const SPINNER_FRAMES = ['-', '\\', '|', '/'];
const LOG_WINDOW = 12;
const BAR_WIDTH = 48;

const COLORS = {
  amber: '#f2a541',
  cyan: '#61dafb',
  steel: '#8ea0b2',
  muted: '#6b7280',
  danger: '#ff6b6b',
  success: '#6ee7b7',
};

const renderBar = (percent: number | null, tick: number): string => {
  if (percent === null) {
    const offset = tick % (BAR_WIDTH - 6);
    return `${' '.repeat(offset)}======${' '.repeat(BAR_WIDTH - 6 - offset)}`;
  }

  const filled = Math.round((percent / 100) * BAR_WIDTH);
  return `${'#'.repeat(filled)}${'.'.repeat(BAR_WIDTH - filled)}`;
};

export const InstallApplication = ({ context, onComplete }: InstallApplicationProps) => {
  const { exit } = useApp();

  const [stage, setStage] = useState<Stage>('running');
  const [tick, setTick] = useState(0);
  const [status, setStatus] = useState('Ready.');
  const [percent, setPercent] = useState<number | null>(0);
  const [logLines, setLogLines] = useState<string[]>([]);
  const [warnings, setWarnings] = useState<InstallWarning[]>([]);
  const [summary, setSummary] = useState<InstallSummary | null>(null);
  const [fatalError, setFatalError] = useState<string | null>(null);
  const [aborting, setAborting] = useState(false);

  const abortRef = useRef(new AbortController());
  const finalizedRef = useRef(false);

  const installDir = resolveInstallDirectory(context.parentDir, context.subfolder);
  const frameWidth = Math.max(72, Math.min((process.stdout.columns || 118) - 2, 118));

  useEffect(() => {
    if (stage !== 'running') {
      return;
    }

    const timer = setInterval(() => setTick((value) => value + 1), 110);
    return () => clearInterval(timer);
  }, [stage]);

  const finalize = (code: number) => {
    if (finalizedRef.current) {
      return;
    }
    finalizedRef.current = true;

    onComplete(code);
    exit();
  };

  useEffect(() => {
    const handleEvent = (event: InstallEvent) => {
      if (event.type === 'status') {
        setStatus(event.text);
      } else if (event.type === 'progress') {
        setPercent(event.percent);
      } else if (event.type === 'log') {
        setLogLines((lines) => [...lines, event.text].slice(-LOG_WINDOW));
      } else {
        setWarnings((items) => [...items, event.warning]);
        setLogLines((lines) => [...lines, formatWarning(event.warning)].slice(-LOG_WINDOW));
      }
    };

    const run = async () => {
      try {
        const result = await runInstall(context, {
          download: createFetchDownloader(),
          expand: expandArchive,
          reporter: createReporter(handleEvent),
          signal: abortRef.current.signal,
        });
        setSummary(result);
        setStage('summary');
      } catch (error) {
        setFatalError(errorMessage(error));
        setStage('fatal');
      }
    };

    void run();
  }, [context]);

  useInput((input, key) => {
    if (key.ctrl && input === 'c') {
      if (stage === 'running') {
        setAborting(true);
        abortRef.current.abort();
        return;
      }
      finalize(130);
      return;
    }

    if (stage === 'running') {
      return;
    }

    if (key.return || input === 'q') {
      finalize(stage === 'fatal' ? 1 : 0);
    }
  });

  const renderHeader = () => (
    <Box borderStyle="round" borderColor={COLORS.amber} flexDirection="column" paddingX={1}>
      <Text color={COLORS.amber} bold>
        DEVKIT SETUP
      </Text>
      <Text color={COLORS.cyan}>project + SDL2 + SDL2_image :: staged install</Text>
      <Text color={COLORS.steel}>target: {installDir}</Text>
    </Box>
  );

  const renderProgress = () => (
    <Box marginTop={1} borderStyle="round" borderColor={COLORS.cyan} paddingX={1} flexDirection="column">
      <Text color={COLORS.cyan}>
        [{stage === 'running' ? SPINNER_FRAMES[tick % SPINNER_FRAMES.length] : '*'}] {status}
      </Text>
      <Text color={COLORS.amber}>
        [{renderBar(percent, tick)}] {percent === null ? '...' : `${percent}%`}
      </Text>
      {aborting && stage === 'running' && (
        <Text color={COLORS.danger}>Abort requested: finishing the current step...</Text>
      )}
    </Box>
  );

  const renderLog = () => (
    <Box marginTop={1} borderStyle="single" borderColor={COLORS.steel} paddingX={1} flexDirection="column">
      <Text bold color={COLORS.steel}>
        Log
      </Text>
      {logLines.length === 0 && <Text color={COLORS.muted}>(no output yet)</Text>}
      {logLines.map((line, index) => (
        <Text
          key={`${index}-${line}`}
          color={line.startsWith('WARNING') ? COLORS.amber : line.startsWith('OK') ? COLORS.success : COLORS.muted}
        >
          {line}
        </Text>
      ))}
    </Box>
  );

  const renderSummary = () => (
    <Box marginTop={1} borderStyle="round" borderColor={COLORS.success} paddingX={1} flexDirection="column">
      <Text bold color={COLORS.success}>
        Setup completed
      </Text>
      <Text color={COLORS.steel}>install path: {summary?.installDir}</Text>
      <Text color={COLORS.steel}>project root: {summary?.projectRoot.strategy}</Text>
      {summary?.dependencies.map((dependency) => (
        <Text key={dependency.name} color={COLORS.success}>
          - {dependency.name}: {dependency.staged.join(', ')} ({dependency.commit})
        </Text>
      ))}
      <Text color={warnings.length > 0 ? COLORS.amber : COLORS.steel}>warnings: {warnings.length}</Text>
      <Text color={COLORS.muted}>Press enter to exit.</Text>
    </Box>
  );

  const renderFatal = () => (
    <Box marginTop={1} borderStyle="round" borderColor={COLORS.danger} paddingX={1} flexDirection="column">
      <Text bold color={COLORS.danger}>
        Setup failed
      </Text>
      <Text color={COLORS.steel}>{fatalError}</Text>
      <Text color={COLORS.muted}>Press enter to exit.</Text>
    </Box>
  );

  const hint = stage === 'running' ? 'ctrl+c abort after current step' : 'enter exit  q quit';

  return (
    <Box flexDirection="column" width={frameWidth} paddingX={1}>
      {renderHeader()}
      {renderProgress()}
      {renderLog()}
      {stage === 'summary' && renderSummary()}
      {stage === 'fatal' && renderFatal()}

      <Box marginTop={1} borderStyle="single" borderColor={COLORS.steel} paddingX={1}>
        <Text color={COLORS.muted}>keys :: {hint}</Text>
      </Box>

      <Box marginTop={1} borderStyle="single" borderColor={COLORS.muted} paddingX={1}>
        <Text color={COLORS.muted}>cwd :: {path.resolve(context.cwd)}</Text>
      </Box>
    </Box>
  );
};
