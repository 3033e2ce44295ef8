/**
 * IAssetFetcher - Port for downloading generated media by URL.
 * Implementations: HttpAssetFetcher
 */
export interface IAssetFetcher {
    fetch(url: string): Promise<Buffer>;
}
