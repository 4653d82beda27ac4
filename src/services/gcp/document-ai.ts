import { DocumentProcessorServiceClient } from '@google-cloud/documentai';
import { config } from '../../config';
import { createChildLogger } from '../../utils/logger';
import { getGcpCredentials } from './credentials';

const log = createChildLogger({ module: 'ocr' });

export interface TextRecognizer {
  recognize(bytes: Buffer, mimeType: string): Promise<string>;
}

/** Raw text recognition through a Document AI OCR processor. */
export class DocumentAiTextRecognizer implements TextRecognizer {
  private client: DocumentProcessorServiceClient | null = null;

  private getClient(): DocumentProcessorServiceClient {
    if (!this.client) {
      const credentials = getGcpCredentials();
      this.client = new DocumentProcessorServiceClient(credentials ? { credentials } : {});
    }
    return this.client;
  }

  async recognize(bytes: Buffer, mimeType: string): Promise<string> {
    if (!config.GCP_PROJECT_ID || !config.GCP_OCR_PROCESSOR_ID) {
      throw new Error('GCP_PROJECT_ID and GCP_OCR_PROCESSOR_ID environment variables are required');
    }
    const name = `projects/${config.GCP_PROJECT_ID}/locations/${config.GCP_LOCATION}/processors/${config.GCP_OCR_PROCESSOR_ID}`;

    const [result] = await this.getClient().processDocument({
      name,
      rawDocument: {
        content: bytes,
        mimeType,
      },
    });

    const text = result.document?.text ?? '';
    log.info({ chars: text.length, pages: result.document?.pages?.length ?? 0 }, 'document text recognized');
    return text;
  }
}
