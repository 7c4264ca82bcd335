const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Decode script bytes as UTF-8, falling back to latin-1 when the bytes are
 * not valid UTF-8. A leading byte order mark is dropped.
 */
export const decodeScriptText = (bytes: Uint8Array): string => {
  try {
    return utf8.decode(bytes);
  } catch (e) {
    if (!(e instanceof TypeError)) {
      throw e;
    }
    return Buffer.from(bytes).toString("latin1");
  }
};
