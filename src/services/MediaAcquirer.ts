/**
 * MediaAcquirer - obtains a video from the device library or a live capture
 *
 * The browser-facing parts (file input, object URLs) sit behind small
 * interfaces so the acquisition flow can be tested without a DOM file dialog.
 */

import { createLogger } from '../utils/logger';

const log = createLogger({ component: 'MediaAcquirer' });

export type MediaSourceKind = 'library' | 'capture';

/** Opens the platform's video picker. Resolves null when the user cancels. */
export interface MediaPicker {
  pickVideo(source: MediaSourceKind): Promise<File | null>;
}

/** Creates and revokes preview URLs for picked media */
export interface PreviewUrlFactory {
  create(blob: Blob): string;
  revoke(url: string): void;
}

export type MediaAcquisitionFailure = 'permission-denied' | 'io';

export class MediaAcquisitionError extends Error {
  readonly reason: MediaAcquisitionFailure;

  constructor(
    reason: MediaAcquisitionFailure,
    message: string,
    options: { cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'MediaAcquisitionError';
    this.reason = reason;
  }
}

/**
 * A video the user picked. The bytes stay in the Blob until the upload
 * streams it; `release()` frees the preview URL.
 */
export interface AcquiredMedia {
  readonly fileName: string;
  readonly blob: Blob;
  readonly source: MediaSourceKind;
  readonly previewUrl: string | null;
  release(): void;
}

export const PERMISSION_DENIED_MESSAGE =
  'Camera or media library access was denied. Allow access and try again.';
export const READ_FAILED_MESSAGE = 'Could not open the selected video.';

export interface MediaAcquirerOptions {
  picker: MediaPicker;
  previews?: PreviewUrlFactory;
}

export class MediaAcquirer {
  private readonly picker: MediaPicker;
  private readonly previews: PreviewUrlFactory | null;

  constructor(options: MediaAcquirerOptions) {
    this.picker = options.picker;
    this.previews = options.previews ?? null;
  }

  /**
   * Ask the user for a video.
   *
   * @returns the picked media, or null when the user cancelled
   * @throws MediaAcquisitionError on permission denial or read failure
   */
  async acquire(source: MediaSourceKind): Promise<AcquiredMedia | null> {
    let file: File | null;
    try {
      file = await this.picker.pickVideo(source);
    } catch (error) {
      throw toAcquisitionError(error);
    }

    if (!file) {
      log.debug(`Picker cancelled (${source})`, { action: 'acquire' });
      return null;
    }

    log.info(`Acquired ${file.name} (${file.size} bytes) from ${source}`, {
      action: 'acquire',
    });
    return this.wrap(file, source);
  }

  private wrap(file: File, source: MediaSourceKind): AcquiredMedia {
    const previews = this.previews;
    let previewUrl = previews ? previews.create(file) : null;

    return {
      fileName: file.name,
      blob: file,
      source,
      get previewUrl() {
        return previewUrl;
      },
      release() {
        if (previewUrl && previews) {
          previews.revoke(previewUrl);
        }
        previewUrl = null;
      },
    };
  }
}

function toAcquisitionError(error: unknown): MediaAcquisitionError {
  if (error instanceof MediaAcquisitionError) return error;
  const name =
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    typeof error.name === 'string'
      ? error.name
      : '';
  if (name === 'NotAllowedError' || name === 'SecurityError') {
    log.warn('Media access denied', { action: 'acquire' });
    return new MediaAcquisitionError('permission-denied', PERMISSION_DENIED_MESSAGE, {
      cause: error,
    });
  }
  log.error('Media acquisition failed', error, { action: 'acquire' });
  return new MediaAcquisitionError('io', READ_FAILED_MESSAGE, { cause: error });
}

// ============================================
// Browser implementations
// ============================================

/** Grace period after the window regains focus before a pick counts as dismissed */
export const FOCUS_SETTLE_MS = 500;

/**
 * Picker backed by a hidden `<input type="file">`. For live capture the
 * `capture` attribute asks mobile browsers to open the camera directly.
 *
 * Not every browser fires `cancel` when the dialog is dismissed, so the pick
 * also resolves null once the window has focus again with no file chosen. A
 * new pick resolves any pick still open as cancelled.
 */
export function createBrowserMediaPicker(doc: Document = document): MediaPicker {
  let abandonPending: (() => void) | null = null;

  return {
    pickVideo(source) {
      abandonPending?.();

      return new Promise<File | null>((resolve, reject) => {
        const view = doc.defaultView;
        const input = doc.createElement('input');
        input.type = 'file';
        input.accept = 'video/*';
        input.style.display = 'none';
        if (source === 'capture') {
          input.setAttribute('capture', 'environment');
        }

        let focusTimer: ReturnType<typeof setTimeout> | null = null;

        const finish = () => {
          input.removeEventListener('change', onChange);
          input.removeEventListener('cancel', onCancel);
          view?.removeEventListener('focus', onFocus);
          if (focusTimer !== null) clearTimeout(focusTimer);
          input.remove();
          if (abandonPending === onCancel) abandonPending = null;
        };
        const onChange = () => {
          const file = input.files?.item(0) ?? null;
          finish();
          resolve(file);
        };
        const onCancel = () => {
          finish();
          resolve(null);
        };
        const onFocus = () => {
          view?.removeEventListener('focus', onFocus);
          // `change` can land shortly after focus returns
          focusTimer = setTimeout(() => {
            if (!input.files || input.files.length === 0) onCancel();
          }, FOCUS_SETTLE_MS);
        };

        input.addEventListener('change', onChange);
        input.addEventListener('cancel', onCancel);
        view?.addEventListener('focus', onFocus);
        doc.body.appendChild(input);
        abandonPending = onCancel;

        try {
          input.click();
        } catch (error) {
          finish();
          reject(error);
        }
      });
    },
  };
}

export const browserPreviewUrls: PreviewUrlFactory = {
  create: (blob) => URL.createObjectURL(blob),
  revoke: (url) => URL.revokeObjectURL(url),
};
