/**
 * File-related type definitions
 */

export interface SourceUnit {
  sourcePath: string; // Absolute path to the source file
  relativePath: string; // Relative to the working directory, for display
  filename: string; // Base filename without extension
}
