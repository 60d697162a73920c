import chalk from 'chalk';
import termSize from 'term-size';

const { stdout, platform } = process;

export class ProgressLogger {
	private counter = 0;
	private total = 0;
	private columns = 0;

	constructor() {
		this.resize();

		stdout.on('resize', () => this.resize());
	}

	start(total: number) {
		this.counter = 0;
		this.total = total;
	}

	tick(item: string) {
		this.counter++;
		const percentage = ((this.counter / this.total) * 100).toFixed(2).padStart(6);
		const line = `[${percentage}%] ${item}`.slice(0, this.columns - 2);

		if (!stdout.isTTY) {
			stdout.write(`${line}\n`);
			return;
		}

		stdout.cursorTo(0);
		stdout.clearLine(1);
		stdout.write(`${chalk.cyan('-')} ${line}`);

		if (this.counter >= this.total) {
			stdout.cursorTo(0);
			stdout.write(`${chalk.green('✓')}\n`);
		}
	}

	private resize() {
		let { columns } = termSize();
		if (platform === 'win32') columns--;
		this.columns = columns;
	}
}
