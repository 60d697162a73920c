/*
 * uint8 | 0x1 | hours   |
 * uint8 | 0x1 | minutes |
 * uint8 | 0x1 | seconds |
 * uint8 | 0x1 | frames  | below the frame rate
 */
export interface Timecode {
	hours: number;
	minutes: number;
	seconds: number;
	frames: number;
}

const pad = (value: number) => value.toString().padStart(2, '0');

export function isValidTimecode(timecode: Timecode, frameRate: number) {
	return timecode.hours < 24
		&& timecode.minutes < 60
		&& timecode.seconds < 60
		&& timecode.frames < frameRate;
}

export function timecodeToFrames(timecode: Timecode, frameRate: number) {
	const totalSeconds = (timecode.hours * 60 + timecode.minutes) * 60 + timecode.seconds;
	return totalSeconds * frameRate + timecode.frames;
}

export function timecodeToSeconds(timecode: Timecode, frameRate: number) {
	return timecodeToFrames(timecode, frameRate) / frameRate;
}

export function timecodeToMilliseconds(timecode: Timecode, frameRate: number) {
	return Math.round(timecodeToSeconds(timecode, frameRate) * 1000);
}

/**
 * Orders two timecodes field by field, so no frame rate is needed.
 * Returns a negative number when `a` comes first, 0 when equal.
 */
export function compareTimecodes(a: Timecode, b: Timecode) {
	return (a.hours - b.hours)
		|| (a.minutes - b.minutes)
		|| (a.seconds - b.seconds)
		|| (a.frames - b.frames);
}

export function formatTimecode(timecode: Timecode) {
	return `${pad(timecode.hours)}:${pad(timecode.minutes)}:${pad(timecode.seconds)}:${pad(timecode.frames)}`;
}

/** Reads the `HHMMSSFF` form the general block uses for its programme timecodes. */
export function parseTimecodeDigits(digits: string): Timecode | undefined {
	const match = /^(\d\d)(\d\d)(\d\d)(\d\d)$/.exec(digits);
	if (!match) return undefined;

	const [, hours, minutes, seconds, frames] = match;
	return {
		hours: Number(hours),
		minutes: Number(minutes),
		seconds: Number(seconds),
		frames: Number(frames),
	};
}
