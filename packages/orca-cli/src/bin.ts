#!/usr/bin/env tsx
import { main } from './index.js'

process.exitCode = await main()
