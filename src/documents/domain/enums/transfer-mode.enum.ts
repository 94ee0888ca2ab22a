export enum TransferMode {
  MOVE = 'MOVE',
  COPY = 'COPY',
}
