import { Command } from 'commander';
import { DocumentIngestion } from '../../services/document.js';
import { formatDuration } from '../utils/progress.js';
import { CommonOptions, commandLogger, loadConfig } from '../utils/runtime.js';
import { formatValidationError } from '../utils/validation.js';

interface IngestOptions extends CommonOptions {
  out?: string;
}

export function createIngestCommand(): Command {
  return new Command('ingest')
    .description('Parse PDF, DOCX, XLSX and CSV files into the document corpus')
    .argument('<dataDir>', 'Directory to scan recursively')
    .option('-o, --out <path>', 'Output JSONL path (defaults to paths.fileCorpus)')
    .option('--config-path <path>', 'Path to configuration file')
    .option('--verbose', 'Show debug logging')
    .action(async (dataDir: string, options: IngestOptions) => {
      try {
        await ingest(dataDir, options);
      } catch (error) {
        console.error(formatValidationError(error));
        process.exit(1);
      }
    });
}

async function ingest(dataDir: string, options: IngestOptions): Promise<void> {
  const config = await loadConfig(options);
  const outPath = options.out ?? config.paths.fileCorpus;
  const startTime = Date.now();

  console.log('📄 Document ingestion');
  console.log(`📁 Data directory: ${dataDir}`);
  console.log(`📝 Output: ${outPath}`);
  console.log(`✂️  Chunks: ${config.chunking.file.chunkSize} chars, ${config.chunking.file.overlap} overlap`);
  console.log('');

  const ingestion = new DocumentIngestion({
    chunking: config.chunking.file,
    logger: commandLogger('ingest', options),
    onFile: (file, count) => {
      console.log(count > 0 ? `  ✅ ${file} (${count} chunks)` : `  ⏭️  ${file} (skipped)`);
    },
  });

  const { stats } = await ingestion.ingest(dataDir, outPath);

  console.log('');
  console.log(`✅ Wrote ${stats.recordsWritten} records in ${formatDuration(Date.now() - startTime)}`);
  console.log(`📊 Files: ${stats.filesFound} found, ${stats.filesParsed} parsed, ${stats.filesSkipped} skipped`);
}
