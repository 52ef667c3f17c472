/**
 * Index Commands
 *
 * Registers the friction index commands:
 * - run: compute and write every result table
 * - top: highest-friction records or districts
 * - hidden-risk: low-volume, high-friction records
 * - report: plain-text summary
 */

import type { Command } from 'commander';
import { registerRunCommand } from './run.js';
import { registerTopCommand } from './top.js';
import { registerHiddenRiskCommand } from './hidden-risk.js';
import { registerReportCommand } from './report.js';

export function registerIndexCommands(program: Command): void {
  registerRunCommand(program);
  registerTopCommand(program);
  registerHiddenRiskCommand(program);
  registerReportCommand(program);
}
