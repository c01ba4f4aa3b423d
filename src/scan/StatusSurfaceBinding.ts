/**
 * Wires a ScanController's events to a host status surface:
 * status text, the results table after every scan or update, and the
 * modal warning when a shot fell back to a lower version.
 */

import { RESULT_COLUMNS } from '../config';
import type { StatusSurface } from '../host/types';
import { rowCells } from './ResultsTable';
import type { ScanController } from './ScanController';

/**
 * Subscribe `surface` to `controller`. Returns a function that removes every subscription.
 */
export function bindStatusSurface(controller: ScanController, surface: StatusSurface): () => void {
  const unsubscribers = [
    controller.on('status', (text) => surface.setStatus(text)),
    controller.on('scanCompleted', (report) => surface.showResults(RESULT_COLUMNS, report.rows.map(rowCells))),
    controller.on('updateCompleted', (report) => surface.showResults(RESULT_COLUMNS, report.rows.map(rowCells))),
    controller.on('warning', (warning) => surface.showWarning(warning.title, warning.message)),
  ];

  return () => {
    for (const unsubscribe of unsubscribers) unsubscribe();
  };
}
