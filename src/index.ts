#!/usr/bin/env node
import { runCli } from './cli/commands';

// Always exits 0; the answer is the single true/false line on stdout
runCli(process.argv);
