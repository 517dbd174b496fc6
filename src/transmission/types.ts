export interface TransmissionTorrent {
  id: number;
  name: string;
  hashString: string;
}

export interface AddedTorrent {
  torrent: TransmissionTorrent | null;
  duplicate: boolean;
}

/** What the dispatcher needs from a download client. */
export interface TorrentClient {
  addTorrent(downloadUrl: string, downloadDir: string): Promise<AddedTorrent>;
}
