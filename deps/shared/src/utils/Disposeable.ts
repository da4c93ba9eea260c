/** 釋放資源，同時支援 AsyncDisposable 與 Disposable */
export async function dispose(target: AsyncDisposable | Disposable) {
  if (Symbol.asyncDispose in target) {
    await target[Symbol.asyncDispose]();
    return;
  }
  target[Symbol.dispose]();
}
