#!/usr/bin/env -S node --import tsx
/* packages/cli/src/index.ts */
import 'reflect-metadata';
import { createProgram } from './program';

await createProgram().parseAsync(process.argv);
