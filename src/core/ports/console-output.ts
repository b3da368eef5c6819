/**
 * Console Output Adapter (Default/CI)
 *
 * Plain console.log-based implementation of OutputPort. Safe for pipes and
 * headless environments.
 */

import c from 'picocolors';
import type { OutputPort } from './output.js';

export const consoleOutput: OutputPort = {
  info(message: string): void {
    console.log(message);
  },

  step(message: string): void {
    console.log(`\n${c.bold(message)}\n${'='.repeat(message.length)}`);
  },

  message(message: string): void {
    console.log(message);
  },

  success(message: string): void {
    console.log(`${c.green('✓')} ${message}`);
  },

  error(message: string): void {
    console.log(`${c.red('✗')} ${message}`);
  },

  warn(message: string): void {
    console.log(`${c.yellow('⚠')} ${message}`);
  },

  note(content: string, title?: string): void {
    if (title) {
      console.log(`\n${c.dim(title)}\n${content}`);
    } else {
      console.log(`\n${content}`);
    }
  }
};
