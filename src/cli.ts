#!/usr/bin/env node
import dotenv from 'dotenv';
import { runCli } from './cli/runCli';
import { createReviewAnalyzerFromConfig } from './analysis/analyzer';
import { loadConfig } from './config/config';

dotenv.config();

runCli(process.argv.slice(2), () => createReviewAnalyzerFromConfig(loadConfig()))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
