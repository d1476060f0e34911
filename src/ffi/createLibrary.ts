import koffi, { type IKoffiLib } from 'koffi';

export function loadLibrary(libPath: string): IKoffiLib {
  try {
    return koffi.load(libPath);
  } catch (err) {
    throw new Error(`Failed to load native library: ${libPath}`, { cause: err });
  }
}
