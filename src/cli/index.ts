#!/usr/bin/env node
// src/cli/index.ts
import { errorMessage } from '../errors.js'

try {
    // configuration is read on import, so a bad environment lands in the catch
    const { buildProgram } = await import('./program.js')
    await buildProgram().parseAsync(process.argv)
} catch (err) {
    console.error(`Error: ${errorMessage(err)}`)
    process.exitCode = 1
}
