import { test, expect } from '@playwright/test';
import { switchWeek } from '../src/scrape/page';
import type { WeekSwitchSteps } from '../src/scrape/page';

function recordingSteps(staleCells: number, overrides: Partial<WeekSwitchSteps> = {}) {
  const calls: string[] = [];
  const steps: WeekSwitchSteps = {
    markCells: async () => {
      calls.push('mark');
      return staleCells;
    },
    clickAndAwaitReload: async () => {
      calls.push('click');
    },
    waitForMarkedCellsGone: async () => {
      calls.push('gone');
    },
    waitForGrid: async () => {
      calls.push('grid');
    },
    ...overrides,
  };
  return { calls, steps };
}

test.describe('switchWeek', () => {
  test('waits for the previous week cells to leave before reading the grid', async () => {
    const { calls, steps } = recordingSteps(3);
    await switchWeek(steps);
    expect(calls).toEqual(['mark', 'click', 'gone', 'grid']);
  });

  test('skips the stale-cell wait when the previous week was empty', async () => {
    const { calls, steps } = recordingSteps(0);
    await switchWeek(steps);
    expect(calls).toEqual(['mark', 'click', 'grid']);
  });

  test('fails when the old cells never go away', async () => {
    const { calls, steps } = recordingSteps(2, {
      waitForMarkedCellsGone: async () => {
        throw new Error('stale cells still attached');
      },
    });

    await expect(switchWeek(steps)).rejects.toThrow('stale cells still attached');
    expect(calls).toEqual(['mark', 'click']);
  });
});
