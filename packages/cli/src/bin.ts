#!/usr/bin/env node

import { main } from "./cli";
import { printError } from "./output";

main(process.argv)
	.then((code) => {
		process.exitCode = code;
	})
	.catch((err: unknown) => {
		printError(String(err));
		process.exitCode = 1;
	});
