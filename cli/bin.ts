#!/usr/bin/env tsx

import { run } from './index'
import { exitWithError } from './helpers'

run().catch((error: unknown) => exitWithError(error))
