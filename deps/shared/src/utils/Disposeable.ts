/**
 * 釋放資源；同時支援 `Symbol.asyncDispose` 與 `Symbol.dispose`。
 */
export async function dispose(
  target: Partial<AsyncDisposable & Disposable>
): Promise<void> {
  const asyncDispose = target[Symbol.asyncDispose];
  if (asyncDispose) {
    await asyncDispose.call(target);
    return;
  }
  target[Symbol.dispose]?.call(target);
}
