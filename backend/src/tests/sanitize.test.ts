import { describe, expect, it } from 'vitest';
import { sanitizeMessage } from '../middleware/sanitize.js';

describe('sanitizeMessage', () => {
  it('drops script blocks and HTML tags', () => {
    expect(sanitizeMessage('<p>Tomato <i>leaves</i> curling</p><script>steal()</script>')).toBe('Tomato leaves curling');
  });

  it('keeps code as backticks and collapses blank lines', () => {
    expect(sanitizeMessage('Use <code>urea</code>\r\n\r\n\r\n\r\nthen   \nwater well')).toBe('Use `urea`\n\nthen\nwater well');
  });

  it('replaces non-breaking spaces and trims the message', () => {
    expect(sanitizeMessage('\u00a0 paddy\u00a0price \n')).toBe('paddy price');
  });
});
