import { EXIT_CODES, runCli } from './cli';
import { DecoderDefectError } from './services/decodeErrors';

runCli(process.argv.slice(2))
    .then(code => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        if (error instanceof DecoderDefectError) {
            console.error(`[disasm] Internal decoder error (${error.kind}): ${error.message}`);
            process.exitCode = EXIT_CODES.defect;
            return;
        }
        console.error('[disasm] Unexpected failure:', error);
        process.exitCode = EXIT_CODES.defect;
    });
