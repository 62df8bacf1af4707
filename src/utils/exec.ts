import { exec as cpExec, type ExecOptions } from "node:child_process";
import { ExecError } from "../errors.js";

export interface ExecResult {
	stdout: string;
	stderr: string;
}

export function exec(command: string, options: ExecOptions = {}): Promise<ExecResult> {
	return new Promise((resolve, reject) => {
		cpExec(command, { maxBuffer: 50 * 1024 * 1024, ...options }, (error, stdout, stderr) => {
			const out = typeof stdout === "string" ? stdout : "";
			const err = typeof stderr === "string" ? stderr : "";
			if (error) {
				reject(new ExecError(command, out, err, error.code));
				return;
			}
			resolve({ stdout: out, stderr: err });
		});
	});
}
