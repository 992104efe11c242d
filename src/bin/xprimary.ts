#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// WHY: APP returns ExitCode; BIN exits the process
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { main } from "../main.js";

void (async (): Promise<void> => {
	try {
		const code = await main();
		// Shell boundary: single process exit
		process.exit(code);
	} catch (error) {
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
