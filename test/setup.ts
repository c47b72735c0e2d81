// Keep conversion progress logs out of the test output
process.env.LOG_LEVEL ??= 'error';
