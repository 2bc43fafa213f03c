export function isTestEnv() {
    // JEST_WORKER_ID is set by Jest; also honor NODE_ENV=test
    return !!(process.env.JEST_WORKER_ID || process.env.NODE_ENV === "test");
}

// Human console output off: --quiet flag or QUIET=1
export function isQuiet() {
    return process.env.QUIET === "1" || process.argv.includes("--quiet");
}

export function noColor() {
    return !!process.env.NO_COLOR || process.argv.includes("--no-color");
}
