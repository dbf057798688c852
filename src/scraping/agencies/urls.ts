/**
 * Agency URL Builders
 */
import { EA, HSE } from "../../config/constants";
import type { EaActionType, HseDatabase } from "../../shared/types/record.types";

const enc = encodeURIComponent;

export function hseCaseListUrl(database: HseDatabase, page: number): string {
  return `${HSE.BASE_URL}/${database}/case/case_list.asp?PN=${page}&ST=C&EO=LIKE&SN=F&SF=DN&SV=&SO=DODS`;
}

export function hseCaseDetailUrl(database: HseDatabase, caseId: string): string {
  return `${HSE.BASE_URL}/${database}/case/case_details.asp?SF=CN&SV=${enc(caseId)}`;
}

export function hseCaseBreachesUrl(database: HseDatabase, caseId: string): string {
  return `${HSE.BASE_URL}/${database}/breach/breach_list.asp?ST=B&SN=F&EO=%3D&SF=CN&SV=${enc(caseId)}`;
}

export function hseNoticeListUrl(page: number, country: string): string {
  return `${HSE.BASE_URL}/notices/notices/notice_list.asp?PN=${page}&ST=N&CO=,AND&SN=F&EO==&SF=CTR&SV=${enc(country)}&SO=DNIS`;
}

export function hseNoticeDetailUrl(noticeNumber: string): string {
  return `${HSE.BASE_URL}/notices/notices/notice_details.asp?SF=CN&SV=${enc(noticeNumber)}`;
}

export function hseNoticeBreachesUrl(noticeNumber: string): string {
  return `${HSE.BASE_URL}/notices/breach/breach_list.asp?ST=B&SN=F&EO==&SF=NN&SV=${enc(noticeNumber)}`;
}

/** EA register query for one action type over a date window */
export function eaRegisterUrl(actionType: EaActionType, dateFrom: string, dateTo: string): string {
  const params = new URLSearchParams({
    "name-search": "",
    actionType: `${EA.ACTION_TYPE_URI_PREFIX}${EA.ACTION_TYPE_SLUGS[actionType]}`,
    offenceType: "",
    agencyFunction: "",
    after: dateFrom,
    before: dateTo,
  });
  return `${EA.REGISTER_URL}?${params.toString()}`;
}
