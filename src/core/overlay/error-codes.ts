/**
 * Overlay and bootstrap error codes
 */
export enum OverlayErrorCode {
    SOURCE_UNREADABLE = 'overlay_source_unreadable',
    COPY_FAILED = 'overlay_copy_failed',
    CLEAR_FAILED = 'overlay_clear_failed',
}
