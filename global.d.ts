// Global type declarations for the image tagger

// Common file/path types
type ImagePath = string;
type ImageList = ReadonlyArray<ImagePath>;

// Narrow union of image extensions picked up from a folder (lowercase)
type ImageExtension = "png" | "jpg" | "jpeg";

// Vision model backends
type ProviderName = "ollama" | "gemini";
