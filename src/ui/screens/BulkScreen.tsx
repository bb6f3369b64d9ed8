import { Fragment, useRef, useState, type ChangeEvent } from 'react';
import * as api from '../../api/client';
import { parseBulkCsv } from '../../api/csvParser';
import type { BulkRow, BulkRowError, BulkValidation } from '../../domain/types';
import { BULK_TYPES, blankDraft, describeSubmit, draftOf, isBlank, numbered, toBulkRow, type DraftRow, type TextField } from '../bulkDraft';
import { Notice, type NoticeState } from '../components/Notice';
import { ScreenHeader } from '../components/ScreenHeader';
import { errorMessage } from '../errors';
import { useLookups } from '../useLookups';

const INITIAL_ROWS = 5;

interface BulkScreenProps {
  refreshKey: number;
  onBack: () => void;
}

export function BulkScreen({ refreshKey, onBack }: BulkScreenProps) {
  const { vaults, categories, units } = useLookups(refreshKey);

  const [rows, setRows] = useState<DraftRow[]>(() =>
    Array.from({ length: INITIAL_ROWS }, (_, i) => blankDraft(i + 1)),
  );
  const [validation, setValidation] = useState<BulkValidation | null>(null);
  const [csvErrors, setCsvErrors] = useState<string[]>([]);
  const [busy, setBusy] = useState(false);
  const [notice, setNotice] = useState<NoticeState | null>(null);
  const fileInputRef = useRef<HTMLInputElement>(null);

  const errorsByRow = new Map<number, BulkRowError[]>();
  for (const error of validation?.errors ?? []) {
    errorsByRow.set(error.rowNumber, [...(errorsByRow.get(error.rowNumber) ?? []), error]);
  }

  const setText = (index: number, field: TextField, value: string) => {
    setRows((current) => current.map((row, i) => (i === index ? { ...row, [field]: value } : row)));
    setValidation(null);
  };

  const addRow = () => setRows((current) => [...current, blankDraft(current.length + 1)]);

  const removeRow = (index: number) => {
    setRows((current) => numbered(current.filter((_, i) => i !== index)));
    setValidation(null);
  };

  const filledRows = (): BulkRow[] => rows.filter((row) => !isBlank(row)).map(toBulkRow);

  const handleFileChange = async (e: ChangeEvent<HTMLInputElement>) => {
    const file = e.target.files?.[0];
    if (!file) return;

    try {
      const result = parseBulkCsv(await file.text());
      setCsvErrors(result.errors);
      if (result.error) {
        setNotice({ kind: 'error', text: result.error });
        return;
      }
      setRows(result.rows.map(draftOf));
      setValidation(null);
      setNotice({ kind: 'success', text: `Loaded ${result.rows.length} rows from ${file.name}` });
      console.log(`[Bulk] Imported ${result.rows.length} rows from ${file.name}`);
    } catch (err) {
      setNotice({ kind: 'error', text: errorMessage(err) });
    } finally {
      if (fileInputRef.current) fileInputRef.current.value = '';
    }
  };

  const handleValidate = async () => {
    setBusy(true);
    setNotice(null);
    try {
      setValidation(await api.validateBulk(filledRows()));
    } catch (err) {
      setNotice({ kind: 'error', text: errorMessage(err) });
    } finally {
      setBusy(false);
    }
  };

  const handleSubmit = async () => {
    setBusy(true);
    setNotice(null);
    try {
      const result = await api.submitBulk(filledRows());
      const outcome = describeSubmit(result);
      setNotice({ kind: outcome.kind, text: outcome.text });
      setValidation(null);
      if (outcome.clearGrid) {
        setRows(Array.from({ length: INITIAL_ROWS }, (_, i) => blankDraft(i + 1)));
      } else {
        console.warn(`[Bulk] ${result.failed} rows failed after commit`);
      }
    } catch (err) {
      const refused = api.bulkValidationOf(err);
      if (refused) {
        setValidation(refused);
        setNotice({ kind: 'error', text: 'Nothing was saved. Fix the highlighted rows and try again.' });
      } else {
        setNotice({ kind: 'error', text: errorMessage(err) });
      }
    } finally {
      setBusy(false);
    }
  };

  const options = (values: readonly string[], placeholder: string) => [
    <option key="" value="">
      {placeholder}
    </option>,
    ...values.map((v) => (
      <option key={v} value={v}>
        {v}
      </option>
    )),
  ];

  return (
    <div className="screen screen-wide">
      <ScreenHeader title="Bulk Add Transactions" onBack={onBack} />

      <div className="toolbar">
        <label className="btn">
          Import CSV
          <input ref={fileInputRef} type="file" accept=".csv,text/csv" hidden onChange={handleFileChange} />
        </label>
        <button type="button" className="btn" onClick={addRow}>
          Add row
        </button>
        <button type="button" className="btn" onClick={handleValidate} disabled={busy}>
          Validate
        </button>
        <button type="button" className="btn btn-primary" onClick={handleSubmit} disabled={busy}>
          Save all
        </button>
      </div>

      {csvErrors.length > 0 && (
        <ul className="csv-errors">
          {csvErrors.map((line) => (
            <li key={line}>{line}</li>
          ))}
        </ul>
      )}
      {validation && (
        <Notice notice={{ kind: validation.valid ? 'success' : 'error', text: validation.summary }} />
      )}
      <Notice notice={notice} onDismiss={() => setNotice(null)} />

      <table className="bulk-grid">
        <thead>
          <tr>
            <th>#</th>
            <th>Type</th>
            <th>Vault</th>
            <th>Amount</th>
            <th>Category</th>
            <th>Description</th>
            <th>Qty</th>
            <th>Unit</th>
            <th>To user</th>
            <th>To vault</th>
            <th>Date</th>
            <th />
          </tr>
        </thead>
        <tbody>
          {rows.map((row, index) => {
            const rowErrors = errorsByRow.get(row.rowNumber) ?? [];
            const invalid = (field: string) => (rowErrors.some((e) => e.field === field) ? 'invalid' : undefined);
            return (
              <Fragment key={row.rowNumber}>
              <tr className={rowErrors.length > 0 ? 'row-invalid' : undefined}>
                <td>{row.rowNumber}</td>
                <td>
                  <select className={invalid('type')} value={row.type} onChange={(e) => setText(index, 'type', e.target.value)}>
                    {options(BULK_TYPES, '')}
                  </select>
                </td>
                <td>
                  <select className={invalid('vault')} value={row.vault} onChange={(e) => setText(index, 'vault', e.target.value)}>
                    {options(
                      vaults.map((v) => v.name),
                      '',
                    )}
                  </select>
                </td>
                <td>
                  <input
                    className={invalid('amount')}
                    inputMode="decimal"
                    value={row.amount}
                    onChange={(e) => setText(index, 'amount', e.target.value)}
                  />
                </td>
                <td>
                  <select
                    className={invalid('category')}
                    value={row.category}
                    onChange={(e) => setText(index, 'category', e.target.value)}
                  >
                    {options(categories, '')}
                  </select>
                </td>
                <td>
                  <input
                    className={invalid('description')}
                    value={row.description}
                    onChange={(e) => setText(index, 'description', e.target.value)}
                  />
                </td>
                <td>
                  <input
                    className={invalid('quantity')}
                    inputMode="decimal"
                    value={row.quantity}
                    onChange={(e) => setText(index, 'quantity', e.target.value)}
                  />
                </td>
                <td>
                  <select className={invalid('unit')} value={row.unit} onChange={(e) => setText(index, 'unit', e.target.value)}>
                    {options(units, '')}
                  </select>
                </td>
                <td>
                  <input
                    className={invalid('toUser')}
                    value={row.toUser}
                    disabled={row.type !== 'transfer'}
                    onChange={(e) => setText(index, 'toUser', e.target.value)}
                  />
                </td>
                <td>
                  <input
                    className={invalid('toVault')}
                    value={row.toVault}
                    disabled={row.type !== 'transfer'}
                    onChange={(e) => setText(index, 'toVault', e.target.value)}
                  />
                </td>
                <td>
                  <input
                    className={invalid('date')}
                    type="date"
                    value={row.date}
                    onChange={(e) => setText(index, 'date', e.target.value)}
                  />
                </td>
                <td>
                  <button type="button" className="btn btn-ghost" aria-label={`Remove row ${row.rowNumber}`} onClick={() => removeRow(index)}>
                    ×
                  </button>
                </td>
              </tr>
              {rowErrors.length > 0 && (
                <tr className="row-errors">
                  <td />
                  <td colSpan={11}>{rowErrors.map((e) => e.message).join('; ')}</td>
                </tr>
              )}
              </Fragment>
            );
          })}
        </tbody>
      </table>
    </div>
  );
}
