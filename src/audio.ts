/**
 * Sound Board - fire-and-forget sound cues.
 *
 * A cue without a configured URL is skipped, and playback failures (autoplay
 * policy, missing file, no audio device) are logged at debug level only.
 */

export type SoundCue = 'click' | 'notify' | 'discord' | 'ring' | 'celebration';

export interface SoundPlayer {
  play(cue: SoundCue): void;
}

// The slice of HTMLAudioElement we use; lets tests pass a stub
export interface AudioLike {
  currentTime: number;
  play(): Promise<void> | void;
}

export interface SoundBoardOptions {
  urls: Partial<Record<SoundCue, string>>;
  muted?: boolean;
  createAudio?: (src: string) => AudioLike;
}

export class SoundBoard implements SoundPlayer {
  private urls: Partial<Record<SoundCue, string>>;
  private createAudio: (src: string) => AudioLike;
  private cache = new Map<SoundCue, AudioLike>();
  muted: boolean;

  constructor(options: SoundBoardOptions) {
    this.urls = options.urls;
    this.muted = options.muted ?? false;
    this.createAudio = options.createAudio ?? (src => new Audio(src));
  }

  play(cue: SoundCue): void {
    if (this.muted) return;
    const audio = this.get(cue);
    if (!audio) return;

    try {
      audio.currentTime = 0;
      const result = audio.play();
      if (result) {
        result.catch(err => console.debug(`[Audio] ${cue} not played:`, err));
      }
    } catch (err) {
      console.debug(`[Audio] ${cue} not played:`, err);
    }
  }

  private get(cue: SoundCue): AudioLike | null {
    const cached = this.cache.get(cue);
    if (cached) return cached;

    const url = this.urls[cue];
    if (!url) return null;

    try {
      const audio = this.createAudio(url);
      this.cache.set(cue, audio);
      return audio;
    } catch (err) {
      console.debug(`[Audio] Cannot create ${cue} from ${url}:`, err);
      return null;
    }
  }
}

/** A player that never makes a sound. */
export const silentPlayer: SoundPlayer = {
  play: () => {},
};
