import * as fs from "node:fs";
import * as tty from "node:tty";
import { ALT_SCREEN_OFF, ALT_SCREEN_ON, HIDE_CURSOR, SHOW_CURSOR } from "./ansi.js";
import { splitInput } from "./input-splitter.js";

export const DEFAULT_COLUMNS = 80;
export const DEFAULT_ROWS = 24;

/**
 * Minimal terminal interface for the picker
 */
export interface Terminal {
	// Enable raw mode and start collecting input
	start(): void;

	// Restore the terminal to the state it was in before start()
	stop(): void;

	/**
	 * Wait for the next keystroke read. Resolves with the bytes of one read;
	 * rejects when the input device fails or closes.
	 */
	read(): Promise<Uint8Array>;

	// Write output to terminal
	write(data: string): void;

	// Get terminal dimensions
	get columns(): number;
	get rows(): number;

	// Cursor visibility
	hideCursor(): void;
	showCursor(): void;

	// Alternate screen buffer
	enterAlternateScreen(): void;
	leaveAlternateScreen(): void;
}

export interface TtyTerminalOptions {
	/** Terminal device to open (default: /dev/tty) */
	path?: string;
	/** Append every write to this file (debugging aid) */
	writeLogPath?: string;
}

const RESTORE_SIGNALS: NodeJS.Signals[] = ["SIGTERM", "SIGHUP"];

/**
 * Real terminal on the controlling tty device.
 *
 * Input and output go through the device rather than stdin/stdout so that
 * stdin can carry data and stdout the result.
 */
export class TtyTerminal implements Terminal {
	private readonly input: tty.ReadStream;
	private readonly output: tty.WriteStream;
	private readonly writeLogPath: string;
	private wasRaw = false;
	private started = false;
	private altScreenActive = false;
	private cursorHidden = false;
	private pending: Uint8Array[] = [];
	private waiter?: { resolve: (bytes: Uint8Array) => void; reject: (error: Error) => void };
	private failure?: Error;

	constructor(options: TtyTerminalOptions = {}) {
		const path = options.path || "/dev/tty";
		const inputFd = fs.openSync(path, "r");
		let outputFd: number;
		try {
			outputFd = fs.openSync(path, "w");
		} catch (error) {
			fs.closeSync(inputFd);
			throw error;
		}
		if (!tty.isatty(inputFd)) {
			fs.closeSync(inputFd);
			fs.closeSync(outputFd);
			throw new Error(`${path} is not a terminal`);
		}
		this.input = new tty.ReadStream(inputFd);
		this.output = new tty.WriteStream(outputFd);
		this.writeLogPath = options.writeLogPath || "";
	}

	start(): void {
		if (this.started) return;
		this.started = true;

		// Save previous state and enable raw mode
		this.wasRaw = this.input.isRaw;
		this.input.setRawMode(true);

		this.input.on("data", this.onData);
		this.input.on("end", this.onEnd);
		this.input.on("error", this.onError);
		this.input.resume();

		// Raw mode must not outlive the process, whichever way it ends
		process.on("exit", this.onExit);
		for (const signal of RESTORE_SIGNALS) {
			process.once(signal, this.onSignal);
		}
	}

	stop(): void {
		if (!this.started) return;
		this.started = false;

		if (this.cursorHidden) this.showCursor();
		if (this.altScreenActive) this.leaveAlternateScreen();

		this.input.removeListener("data", this.onData);
		this.input.removeListener("end", this.onEnd);
		this.input.removeListener("error", this.onError);
		process.removeListener("exit", this.onExit);
		for (const signal of RESTORE_SIGNALS) {
			process.removeListener(signal, this.onSignal);
		}

		// Pause before leaving raw mode so buffered keys are not re-read by the shell
		this.input.pause();
		this.input.setRawMode(this.wasRaw);
	}

	/**
	 * Release the device. The terminal cannot be started again afterwards.
	 */
	close(): void {
		this.stop();
		this.input.destroy();
		this.output.destroy();
	}

	read(): Promise<Uint8Array> {
		const next = this.pending.shift();
		if (next) return Promise.resolve(next);
		if (this.failure) return Promise.reject(this.failure);
		return new Promise((resolve, reject) => {
			this.waiter = { resolve, reject };
		});
	}

	write(data: string): void {
		this.output.write(data);
		if (this.writeLogPath) {
			try {
				fs.appendFileSync(this.writeLogPath, data, { encoding: "utf8" });
			} catch {
				// Ignore logging errors
			}
		}
	}

	get columns(): number {
		return this.output.columns || DEFAULT_COLUMNS;
	}

	get rows(): number {
		return this.output.rows || DEFAULT_ROWS;
	}

	hideCursor(): void {
		this.write(HIDE_CURSOR);
		this.cursorHidden = true;
	}

	showCursor(): void {
		this.write(SHOW_CURSOR);
		this.cursorHidden = false;
	}

	enterAlternateScreen(): void {
		this.write(ALT_SCREEN_ON);
		this.altScreenActive = true;
	}

	leaveAlternateScreen(): void {
		this.write(ALT_SCREEN_OFF);
		this.altScreenActive = false;
	}

	private readonly onData = (chunk: Buffer): void => {
		this.pending.push(...splitInput(chunk));
		this.deliver();
	};

	private readonly onEnd = (): void => {
		this.fail(new Error("Terminal input closed"));
	};

	private readonly onError = (error: Error): void => {
		this.fail(error);
	};

	private readonly onExit = (): void => {
		this.stop();
	};

	private readonly onSignal = (signal: NodeJS.Signals): void => {
		this.stop();
		// Re-raise with our handlers gone so the default action terminates the process
		process.kill(process.pid, signal);
	};

	private fail(error: Error): void {
		this.failure ??= error;
		this.deliver();
	}

	private deliver(): void {
		const waiter = this.waiter;
		if (!waiter) return;

		const next = this.pending.shift();
		if (next) {
			this.waiter = undefined;
			waiter.resolve(next);
		} else if (this.failure) {
			this.waiter = undefined;
			waiter.reject(this.failure);
		}
	}
}
