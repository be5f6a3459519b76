#!/usr/bin/env node
import 'dotenv/config';
import { runCLI } from './index';

runCLI(process.argv.slice(2), { env: process.env }).then(
  code => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  }
);
