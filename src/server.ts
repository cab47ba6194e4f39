#!/usr/bin/env node

import { createApp } from './app.js';
import { colors, log } from './lib/logger.js';
import { openWorkspace } from './lib/workspace.js';

const PORT = Number(process.env.PORT ?? 3456);

// ─── Start Server ────────────────────────────────────────────────────────────

function main(): void {
    const workspace = openWorkspace({ root: process.env.SPECFLOW_ROOT });
    const { app } = createApp(workspace);

    app.listen(PORT, () => {
        console.log(`\n${colors.cyan}${colors.bold}specflow monitor${colors.reset}\n`);
        console.log(`  Repository: ${workspace.context.root}`);
        console.log(`  Server running at: ${colors.green}http://localhost:${PORT}${colors.reset}`);
        console.log(`  API endpoints:`);
        console.log(`    GET  /api/stream    - SSE log stream`);
        console.log(`    GET  /api/status    - Workflow state, artifacts, next step`);
        console.log(`    GET  /api/features  - Numbered features`);
        console.log(`    POST /api/features  - Allocate a feature`);
        console.log(`    POST /api/run       - Start a workflow`);
        console.log(`    POST /api/resume    - Resume the workflow`);
        console.log(`    POST /api/skip      - Skip an optional phase`);
        console.log(`    POST /api/pause     - Soft pause`);
        console.log(`    POST /api/stop      - Hard stop`);
        console.log(`    POST /api/reset     - Remove the workflow state`);
        console.log();
    });
}

try {
    main();
} catch (err) {
    log('error', `Server failed to start: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
}
