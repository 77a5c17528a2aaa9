/**
 * 檔案系統的最小操作集合，executor 只透過它觸碰磁碟。
 * 所有寫入都不覆蓋既有檔案，失敗時直接擲出。
 */
export interface FileOperator {
  exists(path: string): Promise<boolean>;

  /** 檔案大小 (bytes) */
  size(path: string): Promise<number>;

  makeDirs(path: string): Promise<void>;

  /** 目的地已存在時擲出 EEXIST */
  copy(from: string, to: string): Promise<void>;

  /**
   * 搬移檔案。跨磁碟時改為複製、比對大小後再刪除來源，
   * 不會有來源與目的地同時不存在的時刻。
   */
  move(from: string, to: string): Promise<void>;
}
