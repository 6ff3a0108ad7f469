/**
 * Hand-written page fragments shaped like the MangaBuddy markup
 */

export const SERIES_HTML = `<!doctype html>
<html><body>
<div class="name box"><h1>  Test Series  </h1></div>
<div class="detail-box">
	<div class="summary"><p>First line.
		Second   line.</p></div>
	<p><strong>Author(s):</strong> <a href="/authors/jane">Jane Doe</a></p>
	<p><strong>Genre(s):</strong> <a>Action</a>, <a>Comedy</a></p>
	<p><strong>Status:</strong> Ongoing</p>
	<p>No label here</p>
</div>
<script>var bookId = 4242;</script>
</body></html>`

export const SERIES_HTML_NO_BOOK_ID = `<html><body>
<div class="name box"><h1>Test Series</h1></div>
</body></html>`

export const CHAPTER_LIST_HTML = `<ul class="chapter-list">
<li><a href="/test-series/chapter-10"><strong class="chapter-title">Chapter 10</strong></a></li>
<li><a href="/test-series/chapter-2"><strong class="chapter-title">Chapter 2</strong></a></li>
<li><a href="https://mangabuddy.com/test-series/extra"><strong class="chapter-title">Side Story</strong></a></li>
<li><a href="test-series/chapter-1-5"><strong class="chapter-title">Chapter 1.5</strong></a></li>
<li><span>no link</span><strong class="chapter-title">Chapter 3</strong></li>
<li><a href="  "><strong class="chapter-title">Chapter 4</strong></a></li>
<li><a href="/test-series/chapter-5">Chapter 5</a></li>
</ul>`

export const CHAPTER_PAGE_HTML = `<html><body><script>
var chapterId = 99;
var chapImages = 'https://cdn.test/a/01.jpg?token=1, https://cdn.test/a/02.webp ,,https://cdn.test/a/03.png?x=y'
</script></body></html>`

export function chapterPage(images: string[]): string {
	return `<html><script>var chapImages = "${images.join(",")}";</script></html>`
}
