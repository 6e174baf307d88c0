#!/usr/bin/env node

import main from './cli';

import { pipe } from 'fp-ts/lib/function';
import { toProgramArgv } from './utils';

pipe(process.argv, toProgramArgv, argv => main(argv), process.exit);
