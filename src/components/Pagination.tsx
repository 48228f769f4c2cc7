interface PaginationProps {
  older: string | null;
  newer: string | null;
}

// Disabled directions keep their slot as a plain span so the two items never shift.
export default function Pagination({ older, newer }: PaginationProps) {
  return (
    <div className="pagination">
      {older
        ? <a className="pagination-item older" href={older}>Older</a>
        : <span className="pagination-item older">Older</span>}
      {newer
        ? <a className="pagination-item newer" href={newer}>Newer</a>
        : <span className="pagination-item newer">Newer</span>}
    </div>
  );
}
