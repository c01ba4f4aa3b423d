/**
 * Vitest test setup file
 * Keeps resolver debug chatter out of test output; tests that assert on
 * logging install their own sink.
 */

import { Logger, LogLevel } from '../src/utils/Logger';

Logger.setLevel(LogLevel.ERROR);
Logger.setSink(() => {});
