#!/usr/bin/env node
import { main } from './server/index.js';

main().catch((error) => {
    console.error('Server error:', error);
    process.exit(1);
});
