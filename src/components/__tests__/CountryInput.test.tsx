import React from 'react';
import { describe, it, expect, vi } from 'vitest';
import { render as inkRender } from 'ink-testing-library';
import { CountryInput } from '../CountryInput.js';
import { pressEnter, tick, typeText, waitForText } from '../../../tests/helpers/testUtils.js';

describe('CountryInput', () => {
  it('renders the prompt', () => {
    const { lastFrame } = inkRender(<CountryInput onSubmit={vi.fn()} />);

    expect(lastFrame()).toContain('🌐 Get IP Ranges');
    expect(lastFrame()).toContain('Enter a 2-letter country code:');
  });

  it('submits the normalized code', async () => {
    const onSubmit = vi.fn();
    const { lastFrame, stdin } = inkRender(<CountryInput onSubmit={onSubmit} />);
    await tick();

    await typeText(stdin, 'de');
    pressEnter(stdin);
    await tick();

    expect(onSubmit).toHaveBeenCalledWith('DE');
  });

  it('shows an error for anything but two letters', async () => {
    const onSubmit = vi.fn();
    const { lastFrame, stdin } = inkRender(<CountryInput onSubmit={onSubmit} />);
    await tick();

    await typeText(stdin, 'deu');
    pressEnter(stdin);

    await waitForText(lastFrame, '"deu" is not a 2-letter country code');
    expect(onSubmit).not.toHaveBeenCalled();
  });

  it('ignores Enter on empty input', async () => {
    const onSubmit = vi.fn();
    const { lastFrame, stdin } = inkRender(<CountryInput onSubmit={onSubmit} />);
    await tick();

    pressEnter(stdin);
    await tick();

    expect(onSubmit).not.toHaveBeenCalled();
    expect(lastFrame()).not.toContain('is not a 2-letter country code');
  });

  it('cancels on Escape', async () => {
    const onCancel = vi.fn();
    const { stdin } = inkRender(<CountryInput onSubmit={vi.fn()} onCancel={onCancel} />);
    await tick();

    stdin.write('\u001B');
    await tick(50);

    expect(onCancel).toHaveBeenCalled();
  });
});
