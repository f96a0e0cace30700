import { ConfigurationError } from '../errors';
import type { Activity, ActivityAssets, ActivityButton, ActivityTimestamps } from '../types';

/** Option values as cac hands them over: numeric-looking strings arrive as numbers. */
type CliValue = string | number;

export interface ActivityOptions {
    state?: CliValue;
    details?: CliValue;
    largeImage?: CliValue;
    largeText?: CliValue;
    smallImage?: CliValue;
    smallText?: CliValue;
    start?: CliValue;
    end?: CliValue;
    button?: CliValue | CliValue[];
}

/**
 * Parses a `--start`/`--end` value into Unix seconds. Accepts `now` or an integer.
 */
export function parseTimestamp(value: CliValue, nowMs: number): number {
    if (value === 'now') return Math.floor(nowMs / 1000);

    const parsed = typeof value === 'number' ? value : Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new ConfigurationError(`Invalid timestamp "${value}": expected "now" or Unix seconds`);
    }
    return parsed;
}

/**
 * Parses `label=url`. The label ends at the first `=`.
 */
export function parseButton(value: CliValue): ActivityButton {
    const spec = String(value);
    const separator = spec.indexOf('=');
    const label = separator > 0 ? spec.slice(0, separator) : '';
    const url = separator > 0 ? spec.slice(separator + 1) : '';

    if (!label || !url) {
        throw new ConfigurationError(`Invalid button "${spec}": expected label=url`);
    }
    return { label, url };
}

/**
 * Builds an activity from CLI options. Only the flags that were given end up
 * in the payload; the desktop client validates the result.
 */
export function buildActivity(options: ActivityOptions, nowMs: number = Date.now()): Activity {
    const activity: Activity = {};

    if (options.state !== undefined) activity.state = String(options.state);
    if (options.details !== undefined) activity.details = String(options.details);

    const timestamps: ActivityTimestamps = {};
    if (options.start !== undefined) timestamps.start = parseTimestamp(options.start, nowMs);
    if (options.end !== undefined) timestamps.end = parseTimestamp(options.end, nowMs);
    if (Object.keys(timestamps).length > 0) activity.timestamps = timestamps;

    const assets: ActivityAssets = {};
    if (options.largeImage !== undefined) assets.large_image = String(options.largeImage);
    if (options.largeText !== undefined) assets.large_text = String(options.largeText);
    if (options.smallImage !== undefined) assets.small_image = String(options.smallImage);
    if (options.smallText !== undefined) assets.small_text = String(options.smallText);
    if (Object.keys(assets).length > 0) activity.assets = assets;

    if (options.button !== undefined) {
        const buttons = Array.isArray(options.button) ? options.button : [options.button];
        activity.buttons = buttons.map(parseButton);
    }

    return activity;
}
