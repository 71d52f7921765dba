/**
 * Proxy: a caching stand-in for a slow remote video service.
 */

export interface VideoService {
  getVideo(id: string): string;
}

export class RemoteVideoService implements VideoService {
  downloads = 0;

  getVideo(id: string): string {
    this.downloads++;
    return `<video ${id}>`;
  }
}

export class CachedVideoService implements VideoService {
  private readonly cache = new Map<string, string>();

  constructor(private readonly service: VideoService) {}

  getVideo(id: string): string {
    const cached = this.cache.get(id);
    if (cached !== undefined) {
      return cached;
    }
    const video = this.service.getVideo(id);
    this.cache.set(id, video);
    return video;
  }
}

export function demo(print: (line: string) => void): void {
  const remote = new RemoteVideoService();
  const proxy = new CachedVideoService(remote);

  print(`Video intro: ${proxy.getVideo("intro")}`);
  print(`Video intro: ${proxy.getVideo("intro")}`);
  print(`Remote downloads: ${remote.downloads}`);
}
