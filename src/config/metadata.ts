export const serverMetadata = {
  title: 'Local Audio Player',
  instructions: `Use these tools to browse the local music folder, find songs by title, artist or genre, and control playback on this computer.

Tools
- search_songs: Rank library songs against free text (title, artist, "artist - title", filename). Typos are tolerated. Returns path, match_type and score (0-100; 90+ means the query was contained in the tags or filename).
- search_and_play: Search and start the best match if its score is at least the confidence threshold; otherwise fails with NoConfidentMatch and reports the best candidate.
- play_random_song_by_artist / play_random_from_genre: Pick one matching song at random and play it.
- play_audio: Play a file by relative path (from list_audio_files or search_songs) or by bare filename.
- pause_playback, resume_playback, stop_playback, next_song, previous_song, skip_forward, skip_backward, seek_to_position, set_volume (0-10): Control the current track.
- get_playback_status: Current state, file, position, volume and playlist position.
- list_audio_files, list_folders, list_genres, search_by_genre, rescan_library: Browse the library.
- diagnose_audio_system: Check that the media player is installed and which formats are supported.

Notes
- Failures carry a kind (e.g. NotPlaying, EndOfPlaylist, PathTraversalRejected). Report them to the user instead of retrying blindly.
- The playlist is the whole library in folder order unless search_songs ran with as_playlist=true.
- next_song and previous_song stop at the ends of the playlist; they do not wrap around.`,
} as const;

export const toolsMetadata = {
  list_audio_files: {
    name: 'list_audio_files',
    title: 'List Audio Files',
    description:
      'List audio files in the music directory (relative paths, folder, extension). Paginated with limit (1-500) and cursor; refresh=true re-scans the directory first.',
  },
  list_folders: {
    name: 'list_folders',
    title: 'List Folders',
    description:
      "List folders containing audio files with their file counts and up to three sample filenames. Files directly in the music directory are grouped under 'root'.",
  },
  list_genres: {
    name: 'list_genres',
    title: 'List Genres',
    description:
      "List genres found in the tags of the library with song counts, most common first. Untagged songs count as 'Unknown'.",
  },
  search_by_genre: {
    name: 'search_by_genre',
    title: 'Search by Genre',
    description:
      'List songs whose genre tag contains the given text (case-insensitive), in library order.',
  },
  rescan_library: {
    name: 'rescan_library',
    title: 'Rescan Library',
    description:
      'Re-scan the music directory and drop cached tags. The playlist is reset to the library; playback stops if the current song disappeared.',
  },
  play_audio: {
    name: 'play_audio',
    title: 'Play Audio File',
    description:
      'Play an audio file given its path relative to the music directory or its bare filename. Stops whatever was playing.',
  },
  stop_playback: {
    name: 'stop_playback',
    title: 'Stop Playback',
    description: 'Stop playback and release the media player. The playlist position is kept.',
  },
  pause_playback: {
    name: 'pause_playback',
    title: 'Pause Playback',
    description: 'Pause the current song. Pausing an already paused song does nothing.',
  },
  resume_playback: {
    name: 'resume_playback',
    title: 'Resume Playback',
    description: 'Resume a paused song from where it was paused.',
  },
  next_song: {
    name: 'next_song',
    title: 'Next Song',
    description: 'Play the next song of the playlist. Fails with EndOfPlaylist on the last song.',
  },
  previous_song: {
    name: 'previous_song',
    title: 'Previous Song',
    description:
      'Play the previous song of the playlist. Fails with StartOfPlaylist on the first song.',
  },
  skip_forward: {
    name: 'skip_forward',
    title: 'Skip Forward',
    description: 'Jump ahead in the current song (default 30 seconds).',
  },
  skip_backward: {
    name: 'skip_backward',
    title: 'Skip Backward',
    description: 'Jump back in the current song (default 10 seconds).',
  },
  seek_to_position: {
    name: 'seek_to_position',
    title: 'Seek to Position',
    description:
      'Move to an absolute position in seconds. The position is clamped to the length of the song.',
  },
  set_volume: {
    name: 'set_volume',
    title: 'Set Volume',
    description:
      'Set the volume from 0 to 10. Out-of-range values are clamped; the level also applies to songs played later.',
  },
  get_playback_status: {
    name: 'get_playback_status',
    title: 'Playback Status',
    description:
      'Read the playback state (stopped, playing, paused), current file, position, duration, volume and playlist position.',
  },
  search_songs: {
    name: 'search_songs',
    title: 'Search Songs',
    description:
      'Search the library by title, artist or filename with typo tolerance. Returns ranked results with match_type and score. as_playlist=true makes the results the playlist for next_song/previous_song.',
  },
  search_and_play: {
    name: 'search_and_play',
    title: 'Search and Play',
    description:
      'Find the best match for a query and play it, only if the match is confident. Otherwise reports the best candidate and its score without playing.',
  },
  play_random_song_by_artist: {
    name: 'play_random_song_by_artist',
    title: 'Play Random Song by Artist',
    description:
      'Play a random song by the given artist. Close spellings of the artist name are accepted.',
  },
  play_random_from_genre: {
    name: 'play_random_from_genre',
    title: 'Play Random Song from Genre',
    description: 'Play a random song whose genre tag contains the given text.',
  },
  diagnose_audio_system: {
    name: 'diagnose_audio_system',
    title: 'Diagnose Audio System',
    description:
      'Check the media player: whether it is installed, its version, supported formats and the music directory.',
  },
  health: {
    name: 'health',
    title: 'Health Check',
    description: 'Check server health, uptime, and runtime information',
  },
} as const;
