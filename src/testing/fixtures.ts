/**
 * @file Test Fixtures
 *
 * In-memory workbooks and an in-process HTTP stand-in for the transport.
 *
 * @module testing/fixtures
 */

import ExcelJS from 'exceljs';
import type { HttpFetch, HttpRequestInit } from '../transport/types.js';

export const XLSX_CONTENT_TYPE: string = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export const SHEET_URL: string = 'https://docs.google.com/spreadsheets/d/sheet-abc/edit#gid=0';

/** Header plus three returns; the last column is dropped by the default exclusions. */
export const RETURNS_ROWS: ExcelJS.CellValue[][] = [
    ['Store ID', 'Item ', 'IMEI', 'Status', 'Status', 'Cost', 'Link', 'Dispute Reason'],
    ['S-01', 'Phone A', 354653661425023, 'Returned', 'DELIVERED', 120.5, 'https://track.example/1', 'none'],
    ['S-02', 'Phone B', '012345678901234', 'Pending', 'IN TRANSIT', 80, 'https://track.example/2', 'open'],
    ['S-03', 'Phone C', '999490154203237518111', 'Pending', null, null, null, null]
];

/** Build a one-sheet workbook in memory. */
export function workbook_build(rows: ExcelJS.CellValue[][], sheetName: string = 'Returns'): ExcelJS.Workbook {
    const workbook: ExcelJS.Workbook = new ExcelJS.Workbook();
    const sheet: ExcelJS.Worksheet = workbook.addWorksheet(sheetName);
    rows.forEach((row: ExcelJS.CellValue[]): void => {
        sheet.addRow(row);
    });
    return workbook;
}

/** Serialize a one-sheet workbook to xlsx bytes. */
export async function workbook_bytes(rows: ExcelJS.CellValue[][]): Promise<Uint8Array> {
    const buffer: ExcelJS.Buffer = await workbook_build(rows).xlsx.writeBuffer();
    return new Uint8Array(buffer);
}

export function response_make(body: Uint8Array | string, status: number = 200, contentType: string = XLSX_CONTENT_TYPE): Response {
    return new Response(body, { status, headers: { 'content-type': contentType } });
}

export interface HttpCall {
    url: string;
    init: HttpRequestInit;
}

export interface HttpStub {
    http: HttpFetch;
    calls: HttpCall[];
}

/**
 * HTTP stand-in that records each request and answers through `responder`.
 * A responder that throws simulates a network error.
 */
export function httpStub_create(responder: (url: string, callIndex: number) => Response): HttpStub {
    const calls: HttpCall[] = [];
    const http: HttpFetch = async (url: string, init: HttpRequestInit): Promise<Response> => {
        calls.push({ url, init });
        return responder(url, calls.length - 1);
    };
    return { http, calls };
}
