// Application constants

// Matching defaults
export const DEFAULT_FUZZY_THRESHOLD = 0.8 // inclusive

// Parsing defaults
export const DEFAULT_MAX_SECTION_LINES = 9
export const DEFAULT_REPEAT_CHORUS = true

// Default file locations, relative to the working directory
export const DEFAULT_LIBRARY_PATH = "songs.json"
export const DEFAULT_TARGETS_PATH = "target_songs.txt"
export const DEFAULT_SELECTION_CACHE_PATH = "selected_songs.json"
export const DEFAULT_OUTPUT_PATH = "compiled_setlist.json"
