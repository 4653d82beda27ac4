import { PDFDict, PDFDocument, PDFName } from 'pdf-lib';
import { config } from '../../config';
import type { AuthenticityResult, AuthenticityVerdict } from '../../types/certificate';
import denylist from './pdf-editor-denylist.json';

export interface OriginMetadata {
  contentType: string | null;
  contentLength: number | null;
  contentEncoding: string | null;
}

export interface AuthenticityOptions {
  minFileSizeKb: number;
  maxFileSizeKb: number;
  maxModificationSkewSeconds: number;
  editorDenylist: readonly string[];
  now: () => Date;
}

type Severity = 'definitive' | 'soft';

interface Signal {
  text: string;
  severity: Severity;
}

const FUTURE_TOLERANCE_MS = 24 * 60 * 60 * 1000;
const CLOCK_TOLERANCE_MS = 60 * 1000;
const HEADER_WINDOW = 1024;

export function defaultAuthenticityOptions(): AuthenticityOptions {
  return {
    minFileSizeKb: config.AUTH_MIN_FILE_SIZE_KB,
    maxFileSizeKb: config.AUTH_MAX_FILE_SIZE_KB,
    maxModificationSkewSeconds: config.AUTH_MAX_MODIFICATION_SKEW_SECONDS,
    editorDenylist: denylist.editors,
    now: () => new Date(),
  };
}

function checkTransport(bytes: Buffer, origin: OriginMetadata, options: AuthenticityOptions): Signal[] {
  const signals: Signal[] = [];
  const sizeKb = bytes.length / 1024;
  if (sizeKb < options.minFileSizeKb || sizeKb > options.maxFileSizeKb) {
    signals.push({ text: `suspicious_file_size:${sizeKb.toFixed(2)}KB`, severity: 'soft' });
  }

  // fetch decodes compressed bodies, so the declared length only describes identity encodings
  if (origin.contentLength !== null && !origin.contentEncoding && origin.contentLength !== bytes.length) {
    signals.push({
      text: `content_length_mismatch:declared=${origin.contentLength},actual=${bytes.length}`,
      severity: 'soft',
    });
  }

  const mime = origin.contentType?.split(';')[0]?.trim().toLowerCase() ?? '';
  if (mime !== 'application/pdf') {
    signals.push({ text: `mime_mismatch:${mime || 'unknown'}`, severity: 'soft' });
  }
  return signals;
}

function matchEditor(value: string | undefined, editors: readonly string[]): string | null {
  if (!value) return null;
  const lowered = value.toLowerCase();
  return editors.find((editor) => lowered.includes(editor)) ?? null;
}

function readXmpTag(raw: string, tag: string): string | undefined {
  const element = new RegExp(`<${tag}>([^<]*)</${tag}>`).exec(raw);
  if (element?.[1]) return element[1].trim();
  const attribute = new RegExp(`${tag}="([^"]*)"`).exec(raw);
  return attribute?.[1]?.trim() || undefined;
}

function countMarkupAnnotations(doc: PDFDocument): number {
  let count = 0;
  for (const page of doc.getPages()) {
    const annots = page.node.Annots();
    if (!annots) continue;
    for (let i = 0; i < annots.size(); i++) {
      const annot = annots.lookupMaybe(i, PDFDict);
      const subtype = annot?.get(PDFName.of('Subtype'));
      if (subtype instanceof PDFName && subtype.toString() === '/Link') continue;
      count++;
    }
  }
  return count;
}

type MetadataRead<T> = { ok: true; value: T } | { ok: false };

// pdf-lib throws on Info entries that are not strings or not PDF date strings
function readMetadata<T>(read: () => T): MetadataRead<T> {
  try {
    return { ok: true, value: read() };
  } catch {
    return { ok: false };
  }
}

function checkTimestamps(doc: PDFDocument, options: AuthenticityOptions): Signal[] {
  const signals: Signal[] = [];
  const createdRead = readMetadata(() => doc.getCreationDate());
  const modifiedRead = readMetadata(() => doc.getModificationDate());
  if (!createdRead.ok || !modifiedRead.ok) {
    signals.push({ text: 'pdf_metadata_inconsistent:invalid_date', severity: 'definitive' });
  }
  const created = createdRead.ok ? createdRead.value : undefined;
  const modified = modifiedRead.ok ? modifiedRead.value : undefined;
  const now = options.now().getTime();

  if (created && created.getTime() > now + FUTURE_TOLERANCE_MS) {
    signals.push({ text: 'pdf_metadata_inconsistent:created_in_future', severity: 'definitive' });
  }
  if (created && modified) {
    const delta = modified.getTime() - created.getTime();
    if (delta < -CLOCK_TOLERANCE_MS) {
      signals.push({ text: 'pdf_metadata_inconsistent:modified_before_created', severity: 'definitive' });
    } else if (delta > options.maxModificationSkewSeconds * 1000) {
      signals.push({
        text: `pdf_metadata_inconsistent:modified_${Math.round(delta / 1000)}s_after_creation`,
        severity: 'definitive',
      });
    }
  }
  return signals;
}

async function checkPdfStructure(bytes: Buffer, options: AuthenticityOptions): Promise<Signal[]> {
  const raw = bytes.toString('latin1');
  if (!raw.slice(0, HEADER_WINDOW).includes('%PDF-')) {
    return [{ text: 'missing_pdf_header', severity: 'soft' }];
  }

  const signals: Signal[] = [];
  const eofCount = raw.split('%%EOF').length - 1;
  const expectedEofs = raw.slice(0, HEADER_WINDOW).includes('/Linearized') ? 2 : 1;
  if (eofCount > expectedEofs) {
    signals.push({ text: `pdf_incremental_updates:${eofCount - expectedEofs}`, severity: 'soft' });
  }

  let doc: PDFDocument;
  try {
    doc = await PDFDocument.load(bytes, { updateMetadata: false, ignoreEncryption: true });
  } catch {
    signals.push({ text: 'pdf_metadata_unreadable', severity: 'soft' });
    return signals;
  }

  const producerRead = readMetadata(() => doc.getProducer());
  const creatorRead = readMetadata(() => doc.getCreator());
  if (!producerRead.ok || !creatorRead.ok) {
    signals.push({ text: 'pdf_metadata_unreadable', severity: 'soft' });
  }
  const producer = producerRead.ok ? producerRead.value : undefined;
  const xmpProducer = readXmpTag(raw, 'pdf:Producer');
  const candidates = [
    producer,
    creatorRead.ok ? creatorRead.value : undefined,
    xmpProducer,
    readXmpTag(raw, 'xmp:CreatorTool'),
  ];
  const editors = new Set<string>();
  for (const value of candidates) {
    const editor = matchEditor(value, options.editorDenylist);
    if (editor) editors.add(editor);
  }
  for (const editor of editors) {
    signals.push({ text: `pdf_editor_detected:${editor}`, severity: 'definitive' });
  }

  if (producer && xmpProducer && producer.trim().toLowerCase() !== xmpProducer.toLowerCase()) {
    signals.push({ text: 'pdf_metadata_inconsistent:producer_differs_from_xmp', severity: 'definitive' });
  }

  signals.push(...checkTimestamps(doc, options));

  const annotations = countMarkupAnnotations(doc);
  if (annotations > 0) {
    signals.push({ text: `pdf_contains_annotations:${annotations}`, severity: 'soft' });
  }
  return signals;
}

/**
 * Scores the downloaded file. Any definitive signal (denylisted editor,
 * inconsistent metadata) fails it; any other signal is a warning.
 */
export async function assess(
  bytes: Buffer,
  origin: OriginMetadata,
  options: AuthenticityOptions = defaultAuthenticityOptions()
): Promise<AuthenticityResult> {
  const signals = [...(await checkPdfStructure(bytes, options)), ...checkTransport(bytes, origin, options)];

  let verdict: AuthenticityVerdict = 'PASSED';
  if (signals.some((s) => s.severity === 'definitive')) {
    verdict = 'FAILED';
  } else if (signals.length > 0) {
    verdict = 'WARNING';
  }

  return { verdict, signals: signals.map((s) => s.text) };
}
