export type ClipErrorCode =
    | "BAD_VERTEX_COUNT"
    | "INVERTED_RECT"
    | "COORDINATE_RANGE"
    | "BUFFER_CAPACITY"
    | "NOT_CONVEX";

// Thrown by the checked clipping path when a caller precondition does not hold.
export class ClipError extends Error {
    constructor(public readonly code: ClipErrorCode, message: string) {
        super(message);
        this.name = "ClipError";
    }
}
