/**
 * @packageDocumentation
 * Time units for timeouts and duration display.
 */

export const MS_PER_SECOND = 1000;

export const MINUTE_MS = 60 * MS_PER_SECOND;
