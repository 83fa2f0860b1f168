export interface FileUpload {
  name: string;
  size: number;
  contentType: string;
  // where the bytes live, resolvable by the sandbox
  storageRef: string;
  uploadedAt: number;
}
