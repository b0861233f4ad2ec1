export interface TopArtistEntry {
  readonly name: string;
  readonly playCount: number;
}

/**
 * Respuesta cruda de user.gettopartists (formato JSON de Last.fm).
 * Los números vienen como strings.
 */
export interface LastfmTopArtistsResponse {
  topartists?: {
    artist?: LastfmArtist[] | LastfmArtist;
    '@attr'?: {
      user: string;
      totalPages: string;
      page: string;
      perPage: string;
      total: string;
    };
  };
  error?: number;
  message?: string;
}

export interface LastfmArtist {
  name: string;
  playcount: string;
  mbid?: string;
  url?: string;
  '@attr'?: { rank: string };
}
