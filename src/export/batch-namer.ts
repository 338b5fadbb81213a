import { DateKey } from './date-key';

// 같은 (식별자, 날짜)는 항상 같은 이름 -> 재실행 시 덮어쓰기
export function batchName(entityIdentifier: string, dateKey: DateKey): string {
  return `${entityIdentifier}_${dateKey}`;
}

/**
 * Hive 스타일 파티션 경로: {basePath}/dt={dateKey}/{name}.{extension}
 */
export function partitionPath(
  basePath: string,
  dateKey: DateKey,
  name: string,
  extension: string,
): string {
  const root = basePath.replace(/\/+$/, '');
  return `${root}/dt=${dateKey}/${name}.${extension}`;
}
