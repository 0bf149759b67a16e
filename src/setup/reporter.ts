import type { InstallEvent, InstallEventSink, InstallWarning } from '@/setup/types';

export type Reporter = {
  status: (text: string) => void;
  progress: (percent: number | null) => void;
  log: (text: string) => void;
  warn: (warning: InstallWarning) => void;
  readonly warnings: readonly InstallWarning[];
};

const clampPercent = (percent: number): number => Math.max(0, Math.min(100, Math.round(percent)));

/**
 * Wraps an event sink with typed helpers. Warnings are kept on the reporter as well,
 * so callers can read every soft failure of a run without listening to the sink.
 */
export const createReporter = (sink: InstallEventSink = () => undefined): Reporter => {
  const warnings: InstallWarning[] = [];

  const emit = (event: InstallEvent) => {
    sink(event);
  };

  return {
    status: (text) => emit({ type: 'status', text }),
    progress: (percent) =>
      emit({ type: 'progress', percent: percent === null ? null : clampPercent(percent) }),
    log: (text) => emit({ type: 'log', text }),
    warn: (warning) => {
      warnings.push(warning);
      emit({ type: 'warning', warning });
    },
    get warnings() {
      return warnings;
    },
  };
};

export const formatWarning = (warning: InstallWarning): string => {
  const location = warning.path ? ` (${warning.path})` : '';
  return `WARNING: ${warning.message}${location}`;
};
