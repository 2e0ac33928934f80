#!/usr/bin/env node
import * as fs from 'fs';
import { FileDescriptorSink } from '../core/sink';
import { run } from './main';

process.exitCode = run(process.argv.slice(2), {
  read: (path) => fs.readFileSync(path ?? process.stdin.fd, 'utf-8'),
  sink: new FileDescriptorSink(process.stdout.fd),
  error: (message) => console.error(message),
});
