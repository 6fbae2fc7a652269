import { BlobServiceClient, type ContainerClient } from '@azure/storage-blob';
import type { BlobStore } from './blob-store.js';

/**
 * BlobStore backed by one Azure Blob Storage container.
 */
export class AzureBlobStore implements BlobStore {
  constructor(private readonly containerClient: ContainerClient) {}

  static fromConnectionString(connectionString: string, container: string): AzureBlobStore {
    const serviceClient = BlobServiceClient.fromConnectionString(connectionString);
    return new AzureBlobStore(serviceClient.getContainerClient(container));
  }

  async ensureContainer(): Promise<void> {
    await this.containerClient.createIfNotExists();
  }

  async exists(path: string): Promise<boolean> {
    return this.containerClient.getBlobClient(path).exists();
  }

  async createAppendable(path: string): Promise<void> {
    await this.containerClient.getAppendBlobClient(path).create({
      conditions: { ifNoneMatch: '*' },
      blobHTTPHeaders: { blobContentType: 'text/plain' },
    });
  }

  async appendBlock(path: string, content: string): Promise<void> {
    await this.containerClient
      .getAppendBlobClient(path)
      .appendBlock(content, Buffer.byteLength(content));
  }

  async upload(path: string, content: string): Promise<void> {
    await this.containerClient
      .getBlockBlobClient(path)
      .upload(content, Buffer.byteLength(content), {
        blobHTTPHeaders: { blobContentType: 'text/plain' },
      });
  }
}
