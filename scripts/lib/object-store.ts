import { ContainerClient } from '@azure/storage-blob';
import { BlobSettings } from './config-loader';
import { RetryOptions, retryWithBackoff } from './error-handler';

export interface ObjectStore {
  /** Upload a local file to `blobPath`, overwriting any existing blob. */
  uploadFile(localPath: string, blobPath: string): Promise<void>;
}

/**
 * Azure Blob Storage container reached through a SAS container URL
 */
export class BlobObjectStore implements ObjectStore {
  private containerChecked = false;

  constructor(
    private readonly container: ContainerClient,
    private readonly retry: RetryOptions = {}
  ) {}

  static fromSettings(settings: BlobSettings, retry: RetryOptions = {}): BlobObjectStore {
    return new BlobObjectStore(new ContainerClient(settings.containerUrl), retry);
  }

  private async ensureContainer(): Promise<void> {
    if (this.containerChecked) {
      return;
    }
    const exists = await retryWithBackoff(() => this.container.exists(), this.retry);
    if (!exists) {
      console.log(`   ⚠️ Container ${this.container.containerName} does not exist - creating...`);
      await retryWithBackoff(() => this.container.createIfNotExists(), this.retry);
    }
    this.containerChecked = true;
  }

  async uploadFile(localPath: string, blobPath: string): Promise<void> {
    await this.ensureContainer();
    const blob = this.container.getBlockBlobClient(blobPath);
    await retryWithBackoff(() => blob.uploadFile(localPath), this.retry);
  }
}
