import { describe, expect, it, vi } from 'vitest';
import { ProgressTracker, formatProgress } from './progress';

describe('formatProgress', () => {
  it('draws a bar proportional to the percentage', () => {
    expect(formatProgress(40, 'Fetching', 10)).toBe('[████░░░░░░] 40% - Fetching');
    expect(formatProgress(100, 'Done', 4)).toBe('[████] 100% - Done');
  });
});

describe('ProgressTracker', () => {
  it('writes one line per tick', () => {
    const write = vi.fn();
    const progress = new ProgressTracker(2, true, write);

    progress.tick('City');

    expect(write).toHaveBeenCalledWith('[██████████░░░░░░░░░░] 50% - City');
    expect(progress.percent).toBe(50);
  });

  it('keeps counting but stays silent when not verbose', () => {
    const write = vi.fn();
    const progress = new ProgressTracker(4, false, write);

    progress.tick('a');
    progress.tick('b');

    expect(write).not.toHaveBeenCalled();
    expect(progress.percent).toBe(50);
  });

  it('never goes past 100%', () => {
    const progress = new ProgressTracker(1, false);
    progress.tick('a');
    progress.tick('b');
    expect(progress.percent).toBe(100);
  });
});
