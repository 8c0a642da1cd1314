/**
 * Bootstrap scripts evaluated inside worker threads and child processes.
 *
 * They import the job body module by file URL, hand it a job proxy whose
 * `setProgress` and `log` post messages back, hold the blocking lock slot
 * (when the task carries one) around the call, and report the result or
 * error. Scripts are plain CommonJS since they are evaluated, not loaded
 * from disk.
 *
 * `lockSlot` mirrors BlockingMutex.lock/unlock over the same 0/1 slot and
 * only ever runs inside a worker.
 */

const RUN_TASK = `
const { pathToFileURL } = require('node:url');
const path = require('node:path');

function toUrl(mod) {
    return mod.startsWith('file:') ? mod : pathToFileURL(path.resolve(mod)).href;
}

function lockSlot(ref) {
    if (!ref) return null;
    const view = new Int32Array(ref.buffer);
    return {
        lock() {
            while (Atomics.compareExchange(view, ref.index, 0, 1) !== 0) {
                Atomics.wait(view, ref.index, 1);
            }
        },
        unlock() {
            Atomics.store(view, ref.index, 0);
            Atomics.notify(view, ref.index, 1);
        },
    };
}

function describeError(err) {
    if (err instanceof Error) {
        return { name: err.name, message: err.message, stack: err.stack || null };
    }
    return { name: 'Error', message: String(err), stack: null };
}

async function runTask(msg, post) {
    const taskId = msg.taskId;
    const slot = lockSlot(msg.lock);
    const job = {
        id: msg.jobId,
        setProgress(percent, description, extra) {
            post({
                type: 'progress',
                taskId,
                percent: percent == null ? null : percent,
                description: description == null ? null : String(description),
                extra: extra == null ? null : extra,
            });
        },
        log(text) {
            post({ type: 'log', taskId, text: String(text) });
        },
    };
    try {
        const exported = msg.export || 'default';
        const mod = await import(toUrl(msg.module));
        const fn = mod[exported];
        if (typeof fn !== 'function') {
            throw new TypeError('Export ' + exported + ' of ' + msg.module + ' is not a function');
        }
        if (slot) slot.lock();
        let value;
        try {
            value = await fn(job, ...msg.args);
        }
        finally {
            if (slot) slot.unlock();
        }
        await post({ type: 'result', taskId, value });
    }
    catch (err) {
        await post(Object.assign({ type: 'error', taskId }, describeError(err)));
    }
}
`


/**
 * Long-lived pool worker: runs one task per `run` message.
 */
export const THREAD_BOOTSTRAP = `${RUN_TASK}
const { parentPort } = require('node:worker_threads');

parentPort.on('message', (msg) => {
    runTask(msg, (out) => parentPort.postMessage(out));
});
`


/**
 * One-shot child process: runs a single task, then disconnects and exits.
 */
export const PROCESS_BOOTSTRAP = `${RUN_TASK}
function send(out) {
    return new Promise((resolve) => process.send(out, () => resolve()));
}

process.once('message', (msg) => {
    runTask(msg, send).then(() => process.disconnect());
});
`
