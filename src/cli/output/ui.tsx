/**
 * Ink Dashboard
 *
 * Role:
 *   Read-only rendering of the lint pass, one row per dependency.
 *
 * Guarantees:
 *   - No business logic
 *   - Rows appear once the dependency order is known, root last
 *   - Stable rendering under rapid updates
 *
 * Non-goals:
 *   - Progress estimation
 *   - Execution control
 */

import pathLib from 'node:path';
import { pathToFileURL } from 'node:url';

import { Box, render, Text } from 'ink';
import Spinner from 'ink-spinner';
import React, { useEffect, useMemo, useState } from 'react';

import type { DependencyStatus } from '../../lint/types.ts';
import { MS_PER_SECOND } from '../constants/time.ts';
import { calculateSummary } from '../execution/summary.ts';
import { getLogPath } from '../observability/logger.ts';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

interface DependencyState {
  readonly symbol: string;
  readonly status: DependencyStatus;
  readonly logPath: string;
}

export type DashboardEvent =
  | { readonly type: 'dependencies'; readonly symbols: readonly string[] }
  | { readonly type: 'status'; readonly symbol: string; readonly status: DependencyStatus }
  | { readonly type: 'close' };

type DashboardListener = (event: DashboardEvent) => void;

interface DashboardProps {
  readonly logDir: string;
  readonly subtitle?: string;
  readonly onComplete: () => void;
  readonly subscribe: (listener: DashboardListener) => void;
}

export interface DashboardOptions {
  readonly stdout?: NodeJS.WriteStream;
  readonly stderr?: NodeJS.WriteStream;
  /** Second header line, e.g. the program id and network. */
  readonly subtitle?: string;
}

export interface DashboardHandle {
  readonly setDependencies: (this: void, symbols: readonly string[]) => void;
  readonly updateStatus: (this: void, symbol: string, status: DependencyStatus) => void;
  /** Render the summary and release the terminal. */
  readonly waitForExit: (this: void) => Promise<void>;
}

/** Anything the static renderer can print to. */
interface TextSink {
  write(text: string): boolean;
}

/* -------------------------------------------------------------------------- */
/* Utilities                                                                  */
/* -------------------------------------------------------------------------- */

function supportsOsc8(): boolean {
  const term = process.env['TERM'];
  const termProgram = process.env['TERM_PROGRAM'];

  if (termProgram === 'iTerm.app' || termProgram === 'WezTerm') {
    return true;
  }

  // Linux console doesn't support OSC8
  if (typeof term === 'string' && term.includes('linux')) {
    return false;
  }

  return typeof term === 'string' && term !== '' && term !== 'dumb';
}

function createHyperlink(text: string, url: string): string {
  return `\u001b]8;;${url}\u0007${text}\u001b]8;;\u0007`;
}

/**
 * Respects NO_COLOR (https://no-color.org/). The static renderer uses ANSI
 * codes even when stdout is not a TTY.
 */
const supportsColor = (): boolean => {
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  return process.env['TERM'] !== 'dumb';
};

const ANSI = supportsColor()
  ? {
      reset: '\u001b[0m',
      bold: '\u001b[1m',
      dim: '\u001b[2m',
      underline: '\u001b[4m',
      red: '\u001b[31m',
      green: '\u001b[32m',
      yellow: '\u001b[33m',
      blue: '\u001b[34m',
      cyan: '\u001b[36m',
    }
  : {
      reset: '',
      bold: '',
      dim: '',
      underline: '',
      red: '',
      green: '',
      yellow: '',
      blue: '',
      cyan: '',
    };

function colorize(text: string, ...codes: readonly string[]): string {
  return `${codes.join('')}${text}${ANSI.reset}`;
}

/* -------------------------------------------------------------------------- */
/* Status rendering (shared between TTY and non-TTY)                         */
/* -------------------------------------------------------------------------- */

interface StatusDisplay {
  readonly symbol: string;
  readonly label: string;
  readonly color: 'gray' | 'blue' | 'cyan' | 'green' | 'red' | 'yellow';
  readonly ansiColor: string;
  readonly active: boolean;
}

/**
 * Each status carries both a color and a symbol so it reads without color.
 */
const STATUS_CONFIG = {
  PENDING: { symbol: '○', label: 'PENDING', color: 'gray', ansiColor: ANSI.dim, active: false },
  COMPILING: {
    symbol: '◐',
    label: 'COMPILING',
    color: 'blue',
    ansiColor: ANSI.blue,
    active: true,
  },
  FORMATTING: {
    symbol: '◑',
    label: 'FORMATTING',
    color: 'cyan',
    ansiColor: ANSI.cyan,
    active: true,
  },
  FORMATTED: {
    symbol: '✔',
    label: 'FORMATTED',
    color: 'green',
    ansiColor: ANSI.green,
    active: false,
  },
  FAILED: { symbol: '✘', label: 'FAILED', color: 'red', ansiColor: ANSI.red, active: false },
  SKIPPED: {
    symbol: '⊝',
    label: 'SKIPPED',
    color: 'yellow',
    ansiColor: ANSI.yellow,
    active: false,
  },
} as const satisfies Record<DependencyStatus, StatusDisplay>;

const UI_CONSTANTS = {
  COLUMN_WIDTH: {
    DEPENDENCY: 24,
    STATUS: 24,
    LOG: 40,
  },
  TITLE: 'LEO LINT',
  HEADERS: {
    DEPENDENCY: 'Dependency',
    STATUS: 'Status',
    LOG: 'Log',
  },
} as const;

function initialStates(symbols: readonly string[], logDir: string): DependencyState[] {
  return symbols.map((symbol) => ({
    symbol,
    status: 'PENDING',
    logPath: getLogPath(logDir, symbol),
  }));
}

function applyStatus(
  states: readonly DependencyState[],
  symbol: string,
  status: DependencyStatus,
): DependencyState[] {
  return states.map((s) => (s.symbol === symbol && s.status !== status ? { ...s, status } : s));
}

function formatDuration(duration: number): string {
  return `${(duration / MS_PER_SECOND).toFixed(2)}s`;
}

/* -------------------------------------------------------------------------- */
/* Components                                                                 */
/* -------------------------------------------------------------------------- */

const Header: React.FC<{ readonly subtitle?: string }> = ({ subtitle }) => (
  <Box
    borderStyle="double"
    borderColor="cyan"
    paddingX={2}
    paddingY={1}
    flexDirection="column"
    alignItems="center"
    justifyContent="center"
  >
    <Text bold>{UI_CONSTANTS.TITLE}</Text>
    {(subtitle?.length ?? 0) > 0 ? <Text>{subtitle}</Text> : null}
  </Box>
);

const StatusIndicator: React.FC<{ readonly status: DependencyStatus }> = ({ status }) => {
  const config = STATUS_CONFIG[status];

  if (config.active) {
    return (
      <Text color={config.color}>
        <Spinner type="dots" /> {config.label}
      </Text>
    );
  }

  return (
    <Text color={config.color}>
      {config.symbol} {config.label}
    </Text>
  );
};

const LogLink: React.FC<{ readonly path: string; readonly status: DependencyStatus }> = ({
  path,
  status,
}) => {
  if (status === 'PENDING') {
    return <Text dimColor>-</Text>;
  }

  const display = supportsOsc8()
    ? createHyperlink('View Log', pathToFileURL(pathLib.resolve(path)).href)
    : path;

  return <Text>{display}</Text>;
};

const StatusTable: React.FC<{ readonly states: readonly DependencyState[] }> = ({ states }) => (
  <Box flexDirection="column" marginY={1}>
    <Box>
      <Box width={UI_CONSTANTS.COLUMN_WIDTH.DEPENDENCY}>
        <Text bold underline>
          {UI_CONSTANTS.HEADERS.DEPENDENCY}
        </Text>
      </Box>
      <Box width={UI_CONSTANTS.COLUMN_WIDTH.STATUS}>
        <Text bold underline>
          {UI_CONSTANTS.HEADERS.STATUS}
        </Text>
      </Box>
      <Box width={UI_CONSTANTS.COLUMN_WIDTH.LOG}>
        <Text bold underline>
          {UI_CONSTANTS.HEADERS.LOG}
        </Text>
      </Box>
    </Box>

    {states.map((s) => (
      <Box key={s.symbol} marginTop={1}>
        <Box width={UI_CONSTANTS.COLUMN_WIDTH.DEPENDENCY}>
          <Text>{s.symbol}</Text>
        </Box>
        <Box width={UI_CONSTANTS.COLUMN_WIDTH.STATUS}>
          <StatusIndicator status={s.status} />
        </Box>
        <Box width={UI_CONSTANTS.COLUMN_WIDTH.LOG}>
          <LogLink path={s.logPath} status={s.status} />
        </Box>
      </Box>
    ))}
  </Box>
);

const SummaryFooter: React.FC<{
  readonly states: readonly DependencyState[];
  readonly duration: number;
}> = ({ states, duration }) => {
  const summary = useMemo(
    () => calculateSummary(states.map((s) => s.status), duration),
    [states, duration],
  );

  return (
    <Box borderStyle="single" borderColor="gray" padding={1} flexDirection="column">
      <Text bold>Summary</Text>
      <Text>
        Total: {summary.total} |{' '}
        <Text color="green" bold>
          ✔ Formatted: {summary.formatted}
        </Text>{' '}
        |{' '}
        <Text color="red" bold>
          ✘ Failed: {summary.failed}
        </Text>{' '}
        |{' '}
        <Text color="yellow" dimColor>
          ⊝ Skipped: {summary.skipped}
        </Text>
      </Text>
      <Text>Duration: {formatDuration(summary.durationMs)}</Text>
    </Box>
  );
};

const Dashboard: React.FC<DashboardProps> = ({ logDir, subtitle, subscribe, onComplete }) => {
  const [states, setStates] = useState<DependencyState[]>([]);
  const [startTime] = useState(() => Date.now());
  const [done, setDone] = useState(false);
  const [duration, setDuration] = useState(0);

  useEffect(() => {
    subscribe((event) => {
      switch (event.type) {
        case 'dependencies':
          setStates(initialStates(event.symbols, logDir));
          break;
        case 'status':
          setStates((prev) => applyStatus(prev, event.symbol, event.status));
          break;
        case 'close':
          setDuration(Date.now() - startTime);
          setDone(true);
          break;
      }
    });
  }, [subscribe, logDir, startTime]);

  useEffect(() => {
    if (done) {
      onComplete();
    }
  }, [done, onComplete]);

  return (
    <Box flexDirection="column" padding={1}>
      <Header {...(subtitle === undefined ? {} : { subtitle })} />
      <StatusTable states={states} />
      {done && <SummaryFooter states={states} duration={duration} />}
    </Box>
  );
};

/* -------------------------------------------------------------------------- */
/* Non-TTY renderer                                                           */
/* -------------------------------------------------------------------------- */

function statusLabel(status: DependencyStatus): string {
  const config = STATUS_CONFIG[status];
  return colorize(`${config.symbol} ${config.label}`, config.ansiColor);
}

function renderStaticDashboard(
  states: readonly DependencyState[],
  duration: number,
  stdout: TextSink,
  subtitle?: string,
): void {
  const {
    DEPENDENCY: widthDependency,
    STATUS: widthStatus,
    LOG: widthLog,
  } = UI_CONSTANTS.COLUMN_WIDTH;

  const header = colorize(UI_CONSTANTS.TITLE, ANSI.bold, ANSI.cyan);
  const headerRow =
    colorize(UI_CONSTANTS.HEADERS.DEPENDENCY.padEnd(widthDependency), ANSI.bold, ANSI.underline) +
    colorize(UI_CONSTANTS.HEADERS.STATUS.padEnd(widthStatus), ANSI.bold, ANSI.underline) +
    colorize(UI_CONSTANTS.HEADERS.LOG.padEnd(widthLog), ANSI.bold, ANSI.underline);

  const lines = subtitle === undefined ? [header, '', headerRow] : [header, subtitle, '', headerRow];

  for (const state of states) {
    const logDisplay = state.status === 'PENDING' ? colorize('-', ANSI.dim) : state.logPath;
    lines.push(
      state.symbol.padEnd(widthDependency) +
        statusLabel(state.status).padEnd(widthStatus) +
        logDisplay,
    );
  }

  const summary = calculateSummary(
    states.map((s) => s.status),
    duration,
  );
  const formattedLabel = colorize(`Formatted: ${summary.formatted}`, ANSI.green);
  const failedLabel = colorize(`Failed: ${summary.failed}`, ANSI.red);
  const skippedLabel = colorize(`Skipped: ${summary.skipped}`, ANSI.yellow);

  lines.push(
    '',
    colorize('Summary', ANSI.bold),
    `Total: ${summary.total} | ${formattedLabel} | ${failedLabel} | ${skippedLabel}`,
    `Duration: ${formatDuration(summary.durationMs)}`,
    '',
  );

  stdout.write(`${lines.join('\n')}\n`);
}

/**
 * Collects events and prints the table once, when the pass is over.
 */
function createStaticRenderer(
  logDir: string,
  stdout: TextSink,
  subtitle?: string,
  now: () => number = Date.now,
): DashboardHandle {
  let states: DependencyState[] = [];
  const startTime = now();
  let rendered = false;

  return {
    setDependencies: (symbols) => {
      states = initialStates(symbols, logDir);
    },
    updateStatus: (symbol, status) => {
      states = applyStatus(states, symbol, status);
    },
    waitForExit: () => {
      if (!rendered) {
        rendered = true;
        renderStaticDashboard(states, now() - startTime, stdout, subtitle);
      }
      return Promise.resolve();
    },
  };
}

// Exposed for tests to exercise components and branches.
export const __test__ = {
  supportsOsc8,
  supportsColor,
  Dashboard,
  StatusTable,
  renderStaticDashboard,
  createStaticRenderer,
};

/* -------------------------------------------------------------------------- */
/* Public API                                                                 */
/* -------------------------------------------------------------------------- */

export function renderDashboard(logDir: string, options: DashboardOptions = {}): DashboardHandle {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;

  if (!stdout.isTTY) {
    return createStaticRenderer(logDir, stdout, options.subtitle);
  }

  let listener: DashboardListener | undefined;
  const pending: DashboardEvent[] = [];
  const emit = (event: DashboardEvent): void => {
    if (listener) {
      listener(event);
    } else {
      pending.push(event);
    }
  };

  let resolveExit: () => void = () => {};
  const exitPromise = new Promise<void>((resolve) => {
    resolveExit = resolve;
  });

  const { unmount } = render(
    <Dashboard
      logDir={logDir}
      {...(options.subtitle === undefined ? {} : { subtitle: options.subtitle })}
      subscribe={(l) => {
        listener = l;
        for (const event of pending.splice(0)) {
          l(event);
        }
      }}
      onComplete={resolveExit}
    />,
    { stdout, stderr },
  );

  return {
    setDependencies: (symbols) => emit({ type: 'dependencies', symbols }),
    updateStatus: (symbol, status) => emit({ type: 'status', symbol, status }),
    waitForExit: async () => {
      emit({ type: 'close' });
      await exitPromise;
      unmount();
    },
  };
}
