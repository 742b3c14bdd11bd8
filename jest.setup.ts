import dotenv from 'dotenv';

// Tests assert on log buffers, not on console or file output.
process.env.WORKFLOW_FILE_LOGGING_ENABLED = 'false';
process.env.WORKFLOW_CONSOLE_LOGGING_ENABLED = 'false';

dotenv.config({ path: './.env.local' });
