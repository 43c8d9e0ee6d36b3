#!/usr/bin/env node
import {FastMCP} from 'fastmcp'

import {createToolRegistry} from './tools/index.js'

const server = new FastMCP({
    name: 'mermaid-uml-mcp',
    version: '1.0.0',
    logger: console,
})

createToolRegistry().registerAll(server)

await server.start({
    transportType: 'stdio',
})
