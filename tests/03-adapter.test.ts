/**
 * Segment 3: Mock Adapter
 *
 * The in-memory adapter satisfies the shared adapter contract.
 */

import { createMockAdapter } from '../src/adapter'
import { adapterContract } from './helpers/adapter-contract'

adapterContract('Segment 3: mock adapter', async () => createMockAdapter())
