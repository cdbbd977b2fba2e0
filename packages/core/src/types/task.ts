/**
 * Upload Task Types
 */

export type ArtifactKind = 'table' | 'file';

/**
 * One local artifact to upload. Enumerated once, never mutated.
 */
export interface UploadTask {
  readonly sourcePath: string;
  readonly name: string;
  readonly kind: ArtifactKind;
}
