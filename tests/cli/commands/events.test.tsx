import React from 'react';
import { describe, it, expect } from 'vitest';
import { render } from 'ink-testing-library';
import { EventList } from '../../../src/cli/commands/events.js';

describe('EventList', () => {
  it('should show an info message without events', () => {
    const { lastFrame } = render(<EventList events={[]} />);
    expect(lastFrame()).toContain('[INFO] No events');
  });

  it('should show time, type, path and message', () => {
    const events = [
      { type: 'completed', time: new Date(2024, 4, 1, 9, 5, 3), path: '/news/a.zip', message: '' },
      { type: 'error', time: null, path: '', message: 'checksum mismatch' },
    ];
    const { lastFrame } = render(<EventList events={events} />);
    const output = lastFrame() ?? '';

    expect(output).toContain('2024-05-01 09:05:03');
    expect(output).toContain('completed');
    expect(output).toContain('/news/a.zip');
    expect(output).toContain('--');
    expect(output).toContain('checksum mismatch');
  });
});
