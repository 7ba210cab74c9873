/**
 * @vitest-environment jsdom
 */

import { act, cleanup, render, screen } from '@testing-library/react';
import type { ReactNode } from 'react';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { __test__, type DashboardEvent } from './ui.tsx';

vi.mock('ink', async () => {
  const ReactMod = await import('react');
  return {
    Box: ({ children }: { children?: ReactNode }) => ReactMod.createElement('div', null, children),
    Text: ({ children }: { children?: ReactNode }) =>
      ReactMod.createElement('span', null, children),
    render: () => ({ unmount: () => {} }),
  };
});

vi.mock('ink-spinner', async () => {
  const ReactMod = await import('react');
  return { default: () => ReactMod.createElement('span', null, 'spinner') };
});

const { Dashboard, StatusTable } = __test__;

afterEach(() => {
  cleanup();
  vi.unstubAllEnvs();
});

describe('StatusTable', () => {
  it('links log files when the terminal supports OSC8 hyperlinks', () => {
    vi.stubEnv('TERM_PROGRAM', 'iTerm.app');

    render(
      <StatusTable states={[{ symbol: 'util', status: 'FORMATTED', logPath: '/logs/util.log' }]} />,
    );

    expect(screen.getByText('util')).toBeTruthy();
    expect(screen.getByText('✔ FORMATTED')).toBeTruthy();
    expect(screen.getByText((content) => content.includes('View Log'))).toBeTruthy();
  });

  it('prints plain log paths on dumb terminals', () => {
    vi.stubEnv('TERM_PROGRAM', '');
    vi.stubEnv('TERM', 'dumb');

    render(
      <StatusTable states={[{ symbol: 'token', status: 'FAILED', logPath: '/logs/token.log' }]} />,
    );

    expect(screen.getByText('/logs/token.log')).toBeTruthy();
  });

  it('spins while a dependency is compiling', () => {
    render(
      <StatusTable states={[{ symbol: 'app', status: 'COMPILING', logPath: '/logs/app.log' }]} />,
    );

    expect(screen.getByText('spinner')).toBeTruthy();
    expect(screen.getByText('COMPILING')).toBeTruthy();
  });
});

describe('Dashboard', () => {
  it('adds rows when the dependency order arrives and completes on close', () => {
    vi.stubEnv('TERM_PROGRAM', '');
    vi.stubEnv('TERM', 'dumb');
    let listener: ((event: DashboardEvent) => void) | undefined;
    const onComplete = vi.fn();

    render(
      <Dashboard
        logDir="/logs"
        subtitle="app.aleo on testnet"
        subscribe={(l) => {
          listener = l;
        }}
        onComplete={onComplete}
      />,
    );

    expect(screen.getByText('LEO LINT')).toBeTruthy();
    expect(screen.getByText('app.aleo on testnet')).toBeTruthy();
    expect(screen.queryByText('util')).toBeNull();

    act(() => {
      listener?.({ type: 'dependencies', symbols: ['util', 'app'] });
    });
    expect(screen.getByText('util')).toBeTruthy();
    expect(screen.getAllByText('○ PENDING')).toHaveLength(2);

    act(() => {
      listener?.({ type: 'status', symbol: 'util', status: 'FORMATTED' });
      listener?.({ type: 'status', symbol: 'app', status: 'FAILED' });
    });
    expect(onComplete).not.toHaveBeenCalled();

    act(() => {
      listener?.({ type: 'close' });
    });

    expect(onComplete).toHaveBeenCalledTimes(1);
    expect(screen.getByText('Summary')).toBeTruthy();
    expect(screen.getByText('✔ Formatted: 1')).toBeTruthy();
    expect(screen.getByText('✘ Failed: 1')).toBeTruthy();
    expect(screen.getByText('/logs/app.log')).toBeTruthy();
  });
});
