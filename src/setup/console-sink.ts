import pico from 'picocolors';

import { formatWarning } from '@/setup/reporter';
import type { InstallEvent, InstallEventSink } from '@/setup/types';

export type ConsoleStreams = {
  out: (line: string) => void;
  err: (line: string) => void;
};

const defaultStreams: ConsoleStreams = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export const formatInstallEvent = (event: InstallEvent): string | null => {
  switch (event.type) {
    case 'status':
      return pico.cyan(`:: ${event.text}`);
    case 'log':
      return event.text.startsWith('OK: ') ? pico.green(event.text) : event.text;
    case 'warning':
      return pico.yellow(formatWarning(event.warning));
    case 'progress':
      return null;
  }
};

const PERCENT_SUFFIX = / \(\d+%\)$/;

/**
 * Line-per-event sink for headless runs. Progress events are dropped, and a status that
 * only differs from the previous one by its percentage is not printed again.
 */
export const createConsoleSink = (streams: ConsoleStreams = defaultStreams): InstallEventSink => {
  let lastStatus: string | undefined;

  return (event) => {
    if (event.type === 'status') {
      const stem = event.text.replace(PERCENT_SUFFIX, '');
      if (stem === lastStatus) {
        return;
      }
      lastStatus = stem;
    }

    const line = formatInstallEvent(event);
    if (line === null) {
      return;
    }
    if (event.type === 'warning') {
      streams.err(line);
      return;
    }
    streams.out(line);
  };
};
