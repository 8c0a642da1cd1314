import type { Entry } from '../filter/index.js'
import type { ServiceDescriptor } from './types.js'


/**
 * Run the descriptor's extend transform over raw rows. The context builder,
 * when present, runs once for the whole batch.
 */
export async function extendRows(
    descriptor: ServiceDescriptor,
    rows: Entry[],
    extra: Record<string, unknown> = {},
): Promise<Entry[]> {

    const extend = descriptor.datastoreExtend

    if (!extend) {

        return rows
    }

    const context = descriptor.datastoreExtendContext
        ? await descriptor.datastoreExtendContext(rows, extra)
        : null

    const extended: Entry[] = []

    for (const row of rows) {

        extended.push(await extend(row, context))
    }

    return extended
}
