import { BlobServiceClient, type ContainerClient } from '@azure/storage-blob';
import { NotFoundError } from '../errors/index.js';

export interface BlobStore {
  /** Writes (or overwrites) a blob and returns its URL. */
  upload(name: string, content: string): Promise<string>;
  download(name: string): Promise<string>;
  deleteIfExists(name: string): Promise<void>;
}

export class InMemoryBlobStore implements BlobStore {
  private readonly blobs = new Map<string, string>();
  private readonly containerName: string;

  constructor(containerName: string) {
    this.containerName = containerName;
  }

  async upload(name: string, content: string): Promise<string> {
    this.blobs.set(name, content);
    return `memory://${this.containerName}/${name}`;
  }

  async download(name: string): Promise<string> {
    const content = this.blobs.get(name);
    if (content === undefined) {
      throw new NotFoundError(`Blob ${name} not found`);
    }
    return content;
  }

  async deleteIfExists(name: string): Promise<void> {
    this.blobs.delete(name);
  }
}

export class AzureBlobStore implements BlobStore {
  private readonly container: ContainerClient;
  private ready?: Promise<void>;

  constructor(connectionString: string, containerName: string) {
    this.container = BlobServiceClient.fromConnectionString(connectionString).getContainerClient(containerName);
  }

  async upload(name: string, content: string): Promise<string> {
    await this.ensureContainer();
    const blob = this.container.getBlockBlobClient(name);
    await blob.upload(content, Buffer.byteLength(content), {
      blobHTTPHeaders: { blobContentType: 'application/json' }
    });
    return blob.url;
  }

  async download(name: string): Promise<string> {
    await this.ensureContainer();
    const blob = this.container.getBlockBlobClient(name);
    if (!(await blob.exists())) {
      throw new NotFoundError(`Blob ${name} not found`);
    }
    const buffer = await blob.downloadToBuffer();
    return buffer.toString('utf8');
  }

  async deleteIfExists(name: string): Promise<void> {
    await this.ensureContainer();
    await this.container.getBlockBlobClient(name).deleteIfExists();
  }

  private ensureContainer(): Promise<void> {
    if (!this.ready) {
      this.ready = this.container
        .createIfNotExists()
        .then(() => undefined)
        .catch((error: unknown) => {
          this.ready = undefined;
          throw error;
        });
    }
    return this.ready;
  }
}
