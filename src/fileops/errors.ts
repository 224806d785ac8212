export type FileOpErrorKind = "precondition" | "format";

export class FileOpError extends Error {
  readonly kind: FileOpErrorKind;

  constructor(kind: FileOpErrorKind, message: string) {
    super(message);
    this.name = "FileOpError";
    this.kind = kind;
  }
}

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const errorCode = (error: unknown): string | undefined => {
  if (error && typeof error === "object" && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
};
