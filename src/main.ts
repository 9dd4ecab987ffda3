import { main } from '@/concord';

main().catch((error: unknown) => {
    process.stderr.write(`Failed to start server: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(1);
});
